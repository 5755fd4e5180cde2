import { test } from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { OpportunityLedger } from "../../src/arbitrage/ledger/opportunity-ledger";
import {
  FileStateStore,
  STATE_FILE_NAME,
  deserializeState,
} from "../../src/arbitrage/state/state-store";
import { InvalidStateError } from "../../src/errors/app.errors";
import type { Logger } from "../../src/utils/logger.util";

const tempDir = () => fs.mkdtemp(path.join(os.tmpdir(), "arb-state-"));

const collectingLogger = (warnings: string[]): Logger => ({
  info: () => {},
  warn: (msg) => warnings.push(msg),
  error: () => {},
  debug: () => {},
});

test("a disabled store neither writes nor reads", async () => {
  const dir = await tempDir();
  const store = new FileStateStore(dir, false);
  await store.snapshot([], new OpportunityLedger().toState());
  assert.deepEqual(await fs.readdir(dir), []);
  assert.equal(await store.load(), undefined);
  await fs.rm(dir, { recursive: true, force: true });
});

test("a missing state file loads as undefined", async () => {
  const dir = await tempDir();
  const store = new FileStateStore(path.join(dir, "nested"), true);
  assert.equal(await store.load(), undefined);
  await fs.rm(dir, { recursive: true, force: true });
});

test("snapshot round-trips bigint amounts as decimal strings", async () => {
  const dir = await tempDir();
  const store = new FileStateStore(dir, true);
  const ledger = new OpportunityLedger();
  ledger.append({
    buySource: "pool-c",
    sellSource: "pool-b",
    token: "WETH",
    priceDifferenceBps: 847n,
    profitPotential: 42372881355932203389n,
    detector: "det-1",
    height: 4,
  });
  ledger.markExecuted(0, 40000000000000000000n);
  await store.snapshot([{ pairIdentity: "pool-b|pool-c", firstSeenHeight: 2 }], ledger.toState());

  const raw = JSON.parse(await fs.readFile(path.join(dir, STATE_FILE_NAME), "utf8"));
  assert.equal(raw.ledger.records[0].profitPotential, "42372881355932203389");
  assert.equal(raw.ledger.totalProfitPotential, "42372881355932203389");

  const loaded = await store.load();
  assert.ok(loaded);
  assert.deepEqual(loaded.ledger, ledger.toState());
  assert.deepEqual(loaded.persistence, [{ pairIdentity: "pool-b|pool-c", firstSeenHeight: 2 }]);
  await fs.rm(dir, { recursive: true, force: true });
});

test("an unreadable state file is reported and skipped", async () => {
  const dir = await tempDir();
  await fs.writeFile(path.join(dir, STATE_FILE_NAME), "{not json", "utf8");
  const warnings: string[] = [];
  const store = new FileStateStore(dir, true, collectingLogger(warnings));
  assert.equal(await store.load(), undefined);
  assert.equal(warnings.length, 1);
  assert.ok(warnings[0].startsWith("[ARB] Ignoring unreadable state file"));
  await fs.rm(dir, { recursive: true, force: true });
});

test("a state file with the wrong structure is reported and skipped", async () => {
  const dir = await tempDir();
  const file = path.join(dir, STATE_FILE_NAME);
  await fs.writeFile(file, JSON.stringify({ persistence: { a: 1 }, ledger: {} }), "utf8");
  const warnings: string[] = [];
  const store = new FileStateStore(dir, true, collectingLogger(warnings));
  assert.equal(await store.load(), undefined);
  assert.deepEqual(warnings, [
    `[ARB] Ignoring unreadable state file ${file}: persistence must be an array`,
  ]);
  await fs.rm(dir, { recursive: true, force: true });
});

test("deserializeState names the first field that does not fit", () => {
  assert.throws(() => deserializeState([]), new InvalidStateError("state must be an object"));
  assert.throws(
    () => deserializeState({ persistence: [{ pairIdentity: "pool-a|pool-b", firstSeenHeight: "2" }] }),
    new InvalidStateError("persistence[0].firstSeenHeight must be a non-negative integer"),
  );
  assert.throws(
    () =>
      deserializeState({
        ledger: {
          records: [
            {
              id: 3,
              buySource: "pool-c",
              sellSource: "pool-b",
              token: "WETH",
              priceDifferenceBps: "847",
              profitPotential: "1",
              detectedHeight: 4,
              detector: "det-1",
              executed: false,
            },
          ],
        },
      }),
    new InvalidStateError("ledger.records[0].id must be 0, got 3"),
  );
  assert.throws(
    () => deserializeState({ ledger: { totalProfitPotential: "12.5" } }),
    new InvalidStateError("ledger.totalProfitPotential must be an integer string"),
  );
  assert.throws(
    () => deserializeState({ nextHeight: -1 }),
    new InvalidStateError("nextHeight must be a non-negative integer"),
  );
});

test("the next height round-trips when it is given", async () => {
  const dir = await tempDir();
  const store = new FileStateStore(dir, true);
  await store.snapshot([], new OpportunityLedger().toState(), 7);
  const loaded = await store.load();
  assert.ok(loaded);
  assert.equal(loaded.nextHeight, 7);
  assert.deepEqual(loaded.persistence, []);
  await fs.rm(dir, { recursive: true, force: true });
});
