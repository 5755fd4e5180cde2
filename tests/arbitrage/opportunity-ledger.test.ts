import { test } from "node:test";
import assert from "node:assert/strict";
import { OpportunityLedger } from "../../src/arbitrage/ledger/opportunity-ledger";
import type { OpportunityInput } from "../../src/arbitrage/types";
import {
  DuplicateHeightError,
  InvalidIdError,
  OpportunityAlreadyExecutedError,
} from "../../src/errors/app.errors";

function input(height: number, profit: bigint, detector = "det-a"): OpportunityInput {
  return {
    buySource: "pool-c",
    sellSource: "pool-b",
    token: "WETH",
    priceDifferenceBps: 847n,
    profitPotential: profit,
    detector,
    height,
  };
}

test("append assigns dense ids from zero and stores an unexecuted record", () => {
  const ledger = new OpportunityLedger();
  assert.equal(ledger.append(input(1, 100n)), 0);
  assert.equal(ledger.append(input(2, 200n)), 1);
  assert.equal(ledger.append(input(3, 300n)), 2);
  assert.deepEqual(ledger.getOpportunity(1), {
    id: 1,
    buySource: "pool-c",
    sellSource: "pool-b",
    token: "WETH",
    priceDifferenceBps: 847n,
    profitPotential: 200n,
    detectedHeight: 2,
    detector: "det-a",
    executed: false,
  });
});

test("metrics average is the truncated mean of profit potential", () => {
  const two = new OpportunityLedger();
  two.append(input(1, 100n));
  two.append(input(2, 200n));
  const twoMetrics = two.getPerformanceMetrics();
  assert.equal(twoMetrics.totalProfitPotential, 300n);
  assert.equal(twoMetrics.averageProfitPotential, 150n);

  const three = new OpportunityLedger();
  three.append(input(1, 100n));
  three.append(input(2, 150n));
  three.append(input(3, 200n, "det-b"));
  assert.deepEqual(three.getPerformanceMetrics(), {
    count: 3,
    totalProfitPotential: 450n,
    averageProfitPotential: 150n,
    lastRecordedHeight: 3,
    lastDetector: "det-b",
  });

  const uneven = new OpportunityLedger();
  uneven.append(input(1, 100n));
  uneven.append(input(2, 201n));
  assert.equal(uneven.getPerformanceMetrics().averageProfitPotential, 150n);
});

test("metrics on an empty ledger report zero", () => {
  assert.deepEqual(new OpportunityLedger().getPerformanceMetrics(), {
    count: 0,
    totalProfitPotential: 0n,
    averageProfitPotential: 0n,
    lastRecordedHeight: undefined,
    lastDetector: undefined,
  });
});

test("a second record at the same height fails and leaves the ledger unchanged", () => {
  const ledger = new OpportunityLedger();
  ledger.append(input(5, 100n, "det-a"));
  const before = ledger.getPerformanceMetrics();

  assert.throws(() => ledger.append(input(5, 900n, "det-b")), DuplicateHeightError);
  assert.equal(ledger.count, 1);
  assert.deepEqual(ledger.getPerformanceMetrics(), before);
  assert.equal(before.lastDetector, "det-a");
});

test("only the last recorded height is deduplicated", () => {
  const ledger = new OpportunityLedger();
  ledger.append(input(5, 100n));
  ledger.append(input(6, 100n));
  assert.equal(ledger.append(input(5, 100n)), 2);
});

test("invalid input is rejected without mutation", () => {
  const ledger = new OpportunityLedger();
  assert.throws(() => ledger.append(input(-1, 100n)), RangeError);
  assert.throws(() => ledger.append(input(1, -5n)), RangeError);
  assert.equal(ledger.count, 0);
  assert.equal(ledger.getPerformanceMetrics().lastRecordedHeight, undefined);
});

test("markExecuted flips the flag once and keeps aggregates", () => {
  const ledger = new OpportunityLedger();
  ledger.append(input(1, 100n));
  ledger.append(input(2, 200n));

  ledger.markExecuted(1, 175n);
  const record = ledger.getOpportunity(1);
  assert.equal(record.executed, true);
  assert.equal(record.actualProfit, 175n);
  assert.equal(ledger.getOpportunity(0).executed, false);
  assert.equal(ledger.getPerformanceMetrics().totalProfitPotential, 300n);

  assert.throws(() => ledger.markExecuted(1, 1n), OpportunityAlreadyExecutedError);
  assert.equal(ledger.getOpportunity(1).actualProfit, 175n);
});

test("out-of-range ids fail with InvalidIdError", () => {
  const ledger = new OpportunityLedger();
  ledger.append(input(1, 100n));
  assert.throws(() => ledger.markExecuted(1, 0n), InvalidIdError);
  assert.throws(() => ledger.markExecuted(-1, 0n), InvalidIdError);
  assert.throws(() => ledger.getOpportunity(2), InvalidIdError);
  assert.throws(() => ledger.getOpportunity(0.5), InvalidIdError);
  assert.equal(ledger.getOpportunity(0).executed, false);
});

test("recent opportunities return the last min(n, count) records oldest first", () => {
  const ledger = new OpportunityLedger();
  for (let height = 1; height <= 5; height += 1) {
    ledger.append(input(height, BigInt(height * 10)));
  }
  assert.deepEqual(
    ledger.getRecentOpportunities(3).map((record) => record.id),
    [2, 3, 4],
  );
  assert.deepEqual(
    ledger.getRecentOpportunities(10).map((record) => record.detectedHeight),
    [1, 2, 3, 4, 5],
  );
  assert.deepEqual(ledger.getRecentOpportunities(0), []);
  assert.deepEqual(ledger.getRecentOpportunities(-2), []);
  assert.deepEqual(new OpportunityLedger().getRecentOpportunities(3), []);
});

test("returned records are frozen copies", () => {
  const ledger = new OpportunityLedger();
  ledger.append(input(1, 100n));
  const [record] = ledger.getRecentOpportunities(1);
  assert.equal(Object.isFrozen(record), true);
  assert.equal(Object.isFrozen(ledger.getOpportunity(0)), true);
  ledger.markExecuted(0, 90n);
  assert.equal(record.executed, false);
});

test("state restored from a snapshot keeps ids, totals and dedup height", () => {
  const ledger = new OpportunityLedger();
  ledger.append(input(1, 100n));
  ledger.append(input(2, 250n, "det-b"));
  ledger.markExecuted(0, 80n);

  const restored = OpportunityLedger.fromState(ledger.toState());
  assert.deepEqual(restored.getPerformanceMetrics(), ledger.getPerformanceMetrics());
  assert.equal(restored.getOpportunity(0).actualProfit, 80n);
  assert.throws(() => restored.append(input(2, 1n)), DuplicateHeightError);
  assert.equal(restored.append(input(3, 1n)), 2);
});

test("a snapshot with gaps in its ids is refused", () => {
  const ledger = new OpportunityLedger();
  ledger.append(input(1, 100n));
  const state = ledger.toState();
  state.records[0] = { ...state.records[0], id: 4 };
  assert.throws(() => OpportunityLedger.fromState(state), InvalidIdError);
});
