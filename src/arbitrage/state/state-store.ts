import { promises as fs } from 'fs';
import path from 'path';
import { InvalidStateError } from '../../errors/app.errors';
import type { Logger } from '../../utils/logger.util';
import type { LedgerState } from '../ledger/opportunity-ledger';
import type { OpportunityRecord, PersistenceEntry } from '../types';

export const STATE_FILE_NAME = 'arb_state.json';

type PersistedRecord = Omit<
  OpportunityRecord,
  'priceDifferenceBps' | 'profitPotential' | 'actualProfit'
> & {
  priceDifferenceBps: string;
  profitPotential: string;
  actualProfit?: string;
};

export type PersistedState = {
  persistence: PersistenceEntry[];
  ledger: {
    records: PersistedRecord[];
    totalProfitPotential: string;
    lastRecordedHeight?: number;
    lastDetector?: string;
  };
  nextHeight?: number;
};

export type LoadedState = {
  persistence: PersistenceEntry[];
  ledger: LedgerState;
  /** First logical height the next session has not evaluated yet */
  nextHeight?: number;
};

const isMissingFile = (err: unknown): boolean =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function expectObject(value: unknown, field: string): Record<string, unknown> {
  if (!isObject(value)) throw new InvalidStateError(`${field} must be an object`);
  return value;
}

function expectArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) throw new InvalidStateError(`${field} must be an array`);
  return value;
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string') throw new InvalidStateError(`${field} must be a string`);
  return value;
}

function expectHeight(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw new InvalidStateError(`${field} must be a non-negative integer`);
  }
  return value;
}

function expectAmount(value: unknown, field: string): bigint {
  if (typeof value !== 'string' || !/^-?\d+$/.test(value)) {
    throw new InvalidStateError(`${field} must be an integer string`);
  }
  return BigInt(value);
}

const optional = <T>(value: unknown, read: (v: unknown) => T): T | undefined =>
  value === undefined ? undefined : read(value);

function readEntry(value: unknown, index: number): PersistenceEntry {
  const field = `persistence[${index}]`;
  const entry = expectObject(value, field);
  return {
    pairIdentity: expectString(entry.pairIdentity, `${field}.pairIdentity`),
    firstSeenHeight: expectHeight(entry.firstSeenHeight, `${field}.firstSeenHeight`),
  };
}

function readRecord(value: unknown, index: number): OpportunityRecord {
  const field = `ledger.records[${index}]`;
  const raw = expectObject(value, field);
  const id = expectHeight(raw.id, `${field}.id`);
  if (id !== index) throw new InvalidStateError(`${field}.id must be ${index}, got ${id}`);
  if (typeof raw.executed !== 'boolean') {
    throw new InvalidStateError(`${field}.executed must be a boolean`);
  }
  const record: OpportunityRecord = {
    id,
    buySource: expectString(raw.buySource, `${field}.buySource`),
    sellSource: expectString(raw.sellSource, `${field}.sellSource`),
    token: expectString(raw.token, `${field}.token`),
    priceDifferenceBps: expectAmount(raw.priceDifferenceBps, `${field}.priceDifferenceBps`),
    profitPotential: expectAmount(raw.profitPotential, `${field}.profitPotential`),
    detectedHeight: expectHeight(raw.detectedHeight, `${field}.detectedHeight`),
    detector: expectString(raw.detector, `${field}.detector`),
    executed: raw.executed,
  };
  const actualProfit = optional(raw.actualProfit, (v) => expectAmount(v, `${field}.actualProfit`));
  if (actualProfit !== undefined) record.actualProfit = actualProfit;
  return record;
}

export function serializeState(
  persistence: PersistenceEntry[],
  ledger: LedgerState,
  nextHeight?: number,
): PersistedState {
  return {
    persistence,
    ledger: {
      records: ledger.records.map((record) => ({
        ...record,
        priceDifferenceBps: record.priceDifferenceBps.toString(),
        profitPotential: record.profitPotential.toString(),
        actualProfit: record.actualProfit?.toString(),
      })),
      totalProfitPotential: ledger.totalProfitPotential.toString(),
      lastRecordedHeight: ledger.lastRecordedHeight,
      lastDetector: ledger.lastDetector,
    },
    nextHeight,
  };
}

/**
 * Checks the parsed JSON against the persisted shape. Throws
 * `InvalidStateError` naming the first field that does not fit.
 */
export function deserializeState(parsed: unknown): LoadedState {
  const root = expectObject(parsed, 'state');
  const ledger = expectObject(root.ledger ?? {}, 'ledger');
  const loaded: LoadedState = {
    persistence: expectArray(root.persistence ?? [], 'persistence').map(readEntry),
    ledger: {
      records: expectArray(ledger.records ?? [], 'ledger.records').map(readRecord),
      totalProfitPotential: expectAmount(
        ledger.totalProfitPotential ?? '0',
        'ledger.totalProfitPotential',
      ),
      lastRecordedHeight: optional(ledger.lastRecordedHeight, (v) =>
        expectHeight(v, 'ledger.lastRecordedHeight'),
      ),
      lastDetector: optional(ledger.lastDetector, (v) => expectString(v, 'ledger.lastDetector')),
    },
  };
  const nextHeight = optional(root.nextHeight, (v) => expectHeight(v, 'nextHeight'));
  if (nextHeight !== undefined) loaded.nextHeight = nextHeight;
  return loaded;
}

/**
 * JSON snapshot of the persistence tracker, the ledger and the engine's next
 * height under `stateDir`.
 */
export class FileStateStore {
  private readonly snapshotPath: string;
  private readonly snapshotEnabled: boolean;
  private readonly logger?: Logger;

  constructor(stateDir: string, snapshotEnabled: boolean, logger?: Logger) {
    this.snapshotPath = path.join(stateDir, STATE_FILE_NAME);
    this.snapshotEnabled = snapshotEnabled;
    this.logger = logger;
  }

  get filePath(): string {
    return this.snapshotPath;
  }

  async load(): Promise<LoadedState | undefined> {
    if (!this.snapshotEnabled) return undefined;
    let raw: string;
    try {
      raw = await fs.readFile(this.snapshotPath, 'utf8');
    } catch (err) {
      if (isMissingFile(err)) return undefined;
      throw err;
    }
    try {
      return deserializeState(JSON.parse(raw));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger?.warn(`[ARB] Ignoring unreadable state file ${this.snapshotPath}: ${message}`);
      return undefined;
    }
  }

  async snapshot(
    persistence: PersistenceEntry[],
    ledger: LedgerState,
    nextHeight?: number,
  ): Promise<void> {
    if (!this.snapshotEnabled) return;
    const state = serializeState(persistence, ledger, nextHeight);
    await fs.mkdir(path.dirname(this.snapshotPath), { recursive: true });
    await fs.writeFile(this.snapshotPath, JSON.stringify(state, null, 2), 'utf8');
  }
}
