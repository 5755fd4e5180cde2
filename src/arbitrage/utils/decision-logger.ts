import { promises as fs } from 'fs';
import path from 'path';

export type DecisionLogEntry = {
  ts: string;
  height: number;
  action: 'accept' | 'reject' | 'duplicate';
  reason?: string;
  pair?: string;
  buy_source?: string;
  sell_source?: string;
  gap_bps?: string;
  max_profit?: string;
  gas_cost?: string;
  first_seen_height?: number;
  opportunity_id?: number;
};

export class DecisionLogger {
  private readonly path?: string;

  constructor(path?: string) {
    this.path = path || undefined;
  }

  async append(entry: DecisionLogEntry): Promise<void> {
    if (!this.path) return;
    const line = `${JSON.stringify(entry)}\n`;
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, line, { encoding: 'utf8' });
  }
}
