import type { CostEntry, CostLedger, PriceTable } from '../domain/model/CostLedger.js';
import { COST_EPSILON } from '../domain/model/CostLedger.js';
import { BudgetExceededError } from '../domain/errors.js';
import type { EventBus } from './EventBus.js';

export interface CostMeterOptions {
  readonly prices: PriceTable;
  readonly budgetLimit?: number;
  /** Receives `budget:exceeded` at the crossing record. */
  readonly eventBus?: EventBus;
}

interface MutableEntry {
  count: number;
  units: number;
  cost: number;
}

/**
 * Accumulates priced usage and enforces the budget.
 *
 * `record()` is synchronous: the read-modify-write of the total never spans
 * an await, so concurrent workers cannot interleave inside it.
 */
export class CostMeter {
  private readonly prices: PriceTable;
  private readonly budgetLimit: number | undefined;
  private readonly eventBus: EventBus | undefined;
  private readonly entries = new Map<string, MutableEntry>();
  private total = 0;
  private exceeded = false;

  constructor(options: CostMeterOptions) {
    for (const [kind, price] of Object.entries(options.prices)) {
      if (!Number.isFinite(price) || price < 0) {
        throw new RangeError(`Unit price for '${kind}' must be a non-negative number`);
      }
    }
    if (options.budgetLimit !== undefined && !(options.budgetLimit > 0)) {
      throw new RangeError('Budget limit must be positive');
    }
    this.prices = options.prices;
    this.budgetLimit = options.budgetLimit;
    this.eventBus = options.eventBus;
  }

  /**
   * Add `quantity * price(kind)` to the total.
   *
   * The cost is accrued even when it breaches the budget; the caller then
   * sees `BudgetExceededError`. Every later call throws as well.
   *
   * @returns The cost of this call.
   */
  record(kind: string, quantity: number): number {
    const price = this.prices[kind];
    if (price === undefined) {
      throw new RangeError(`No unit price configured for '${kind}'`);
    }
    if (!Number.isFinite(quantity) || quantity < 0) {
      throw new RangeError(`Quantity for '${kind}' must be a non-negative number, got ${String(quantity)}`);
    }

    const cost = quantity * price;
    const entry = this.entries.get(kind) ?? { count: 0, units: 0, cost: 0 };
    entry.count += 1;
    entry.units += quantity;
    entry.cost += cost;
    this.entries.set(kind, entry);
    this.total += cost;

    if (this.budgetLimit !== undefined && this.total >= this.budgetLimit - COST_EPSILON) {
      if (!this.exceeded) {
        this.exceeded = true;
        this.eventBus?.emit({
          type: 'budget:exceeded',
          total: this.total,
          budgetLimit: this.budgetLimit,
          kind,
          timestamp: Date.now(),
        });
      }
      throw new BudgetExceededError(this.total, this.budgetLimit);
    }

    return cost;
  }

  /** True once a record has met or crossed the budget. */
  isExceeded(): boolean {
    return this.exceeded;
  }

  getTotal(): number {
    return this.total;
  }

  getBudgetLimit(): number | undefined {
    return this.budgetLimit;
  }

  snapshot(): CostLedger {
    const entries: Record<string, CostEntry> = {};
    for (const [kind, entry] of this.entries) {
      entries[kind] = Object.freeze({ ...entry });
    }
    Object.freeze(entries);
    return Object.freeze(
      this.budgetLimit !== undefined
        ? { entries, total: this.total, budgetLimit: this.budgetLimit }
        : { entries, total: this.total },
    );
  }

  reset(): void {
    this.entries.clear();
    this.total = 0;
    this.exceeded = false;
  }
}
