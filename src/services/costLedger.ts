/**
 * Cost Ledger
 * Per-run accumulator for external-capability usage. Construct one at run
 * start, pass it down, snapshot it when the report is assembled.
 * Location: src/services/costLedger.ts
 */

import type { CostEntry, CostSnapshot, UnitRates } from '../types/satellite';
import { InvalidInputError } from './errors';

export interface Usage {
  inputUnits: number;
  outputUnits: number;
}

/**
 * Cost of one call from per-million-unit rates
 */
export function costForUsage(usage: Usage, rates: UnitRates): number {
  return (
    (usage.inputUnits / 1_000_000) * rates.inputPerMillion +
    (usage.outputUnits / 1_000_000) * rates.outputPerMillion
  );
}

export class CostLedger {
  // Keyed by call id so a retried record() cannot count a call twice
  private readonly entries = new Map<string, Readonly<CostEntry>>();

  /**
   * Record one call. Synchronous, so concurrent pipeline legs cannot
   * interleave inside it; returns false when the call id was already recorded.
   */
  record(entry: CostEntry): boolean {
    const { callId, inputUnits, outputUnits, cost } = entry;
    if (!callId) {
      throw new InvalidInputError('Cost entry requires a call id');
    }
    for (const [name, value] of Object.entries({ inputUnits, outputUnits, cost })) {
      if (!Number.isFinite(value) || value < 0) {
        throw new InvalidInputError(`Cost entry ${callId}: ${name} must be a non-negative number (got ${value})`);
      }
    }
    if (this.entries.has(callId)) {
      console.warn(`[Cost] ⚠️ Call ${callId} already recorded, ignoring duplicate`);
      return false;
    }
    this.entries.set(callId, Object.freeze({ ...entry }));
    return true;
  }

  snapshot(): CostSnapshot {
    let totalCost = 0;
    let totalInputUnits = 0;
    let totalOutputUnits = 0;
    for (const entry of this.entries.values()) {
      totalCost += entry.cost;
      totalInputUnits += entry.inputUnits;
      totalOutputUnits += entry.outputUnits;
    }
    return Object.freeze({
      totalCost,
      totalInputUnits,
      totalOutputUnits,
      callCount: this.entries.size,
    });
  }

  list(): Array<Readonly<CostEntry>> {
    return [...this.entries.values()];
  }
}
