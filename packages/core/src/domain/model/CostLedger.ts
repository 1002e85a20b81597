/** Accumulated usage of one metered kind. */
export interface CostEntry {
  /** Number of `record()` calls. */
  readonly count: number;
  /** Sum of recorded quantities. */
  readonly units: number;
  /** Sum of `quantity * unitPrice`. */
  readonly cost: number;
}

/** Immutable view of the cost meter. */
export interface CostLedger {
  readonly entries: Readonly<Record<string, CostEntry>>;
  readonly total: number;
  readonly budgetLimit?: number;
}

/** Unit price per metered kind, in the batch currency. */
export type PriceTable = Readonly<Record<string, number>>;

/** Tolerance applied when comparing accumulated float costs. */
export const COST_EPSILON = 1e-9;

export function emptyLedger(budgetLimit?: number): CostLedger {
  return budgetLimit !== undefined ? { entries: {}, total: 0, budgetLimit } : { entries: {}, total: 0 };
}

/** Share of the budget used, in percent. `undefined` when no limit is set. */
export function budgetUsedPercent(ledger: CostLedger): number | undefined {
  if (ledger.budgetLimit === undefined || ledger.budgetLimit <= 0) return undefined;
  return (ledger.total / ledger.budgetLimit) * 100;
}
