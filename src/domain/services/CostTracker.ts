/**
 * Cost Tracker - running USD estimate across the funnel stages
 *
 * One tracker is shared by every stage of a run so a single job's matching
 * pass reports one combined total.
 */

const TOKENS_PER_PRICE_UNIT = 1_000_000;

export interface CostSnapshot {
  inputUnits: number;
  outputUnits: number;
  totalCostUsd: number;
}

export class CostTracker {
  private inputUnits = 0;
  private outputUnits = 0;
  private costUsd = 0;

  /**
   * Prices are USD per million units (tokens)
   */
  record(inputUnits: number, outputUnits: number, pricePerMillionIn: number, pricePerMillionOut: number): void {
    this.inputUnits += inputUnits;
    this.outputUnits += outputUnits;
    this.costUsd +=
      (inputUnits / TOKENS_PER_PRICE_UNIT) * pricePerMillionIn +
      (outputUnits / TOKENS_PER_PRICE_UNIT) * pricePerMillionOut;
  }

  totalCost(): number {
    return roundTo(this.costUsd, 6);
  }

  snapshot(): CostSnapshot {
    return {
      inputUnits: this.inputUnits,
      outputUnits: this.outputUnits,
      totalCostUsd: this.totalCost(),
    };
  }
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
