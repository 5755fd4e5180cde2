import type { Observation, PriceSource } from "../types";

/**
 * Replays a fixed script of observations. Each `collect` call returns the
 * next entry re-stamped with the requested height; the last entry repeats
 * once the script runs out.
 */
export class StaticPriceSource implements PriceSource {
  private readonly script: readonly Observation[];
  private cursor = 0;

  constructor(script: readonly Observation[]) {
    if (script.length === 0) {
      throw new RangeError("StaticPriceSource needs at least one observation");
    }
    this.script = script;
  }

  collect(height: number): Observation {
    const template = this.script[Math.min(this.cursor, this.script.length - 1)];
    this.cursor += 1;
    const [a, b, c] = template.sources;
    return Object.freeze({
      sources: Object.freeze([
        Object.freeze({ ...a, lastUpdateHeight: height }),
        Object.freeze({ ...b, lastUpdateHeight: height }),
        Object.freeze({ ...c, lastUpdateHeight: height }),
      ] as const),
      logicalHeight: height,
      gasPriceHint: template.gasPriceHint,
    });
  }
}
