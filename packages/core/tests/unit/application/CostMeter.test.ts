import { describe, it, expect, vi } from 'vitest';
import { CostMeter } from '../../../src/application/CostMeter.js';
import { EventBus } from '../../../src/application/EventBus.js';
import { BudgetExceededError } from '../../../src/domain/errors.js';

describe('CostMeter', () => {
  it('should accumulate N records of quantity Q at price P to N*Q*P', () => {
    const meter = new CostMeter({ prices: { llm_call: 0.25 } });

    for (let i = 0; i < 4; i++) meter.record('llm_call', 3);

    expect(meter.getTotal()).toBe(3);
    expect(meter.snapshot().entries).toEqual({ llm_call: { count: 4, units: 12, cost: 3 } });
  });

  it('should return the cost of each call', () => {
    const meter = new CostMeter({ prices: { search: 0.005 } });

    expect(meter.record('search', 2)).toBeCloseTo(0.01, 10);
  });

  it('should keep per-kind entries apart', () => {
    const meter = new CostMeter({ prices: { search: 0.01, llm_call: 0.5 } });

    meter.record('search', 10);
    meter.record('llm_call', 1);

    const snapshot = meter.snapshot();
    expect(snapshot.entries['search']?.cost).toBeCloseTo(0.1, 10);
    expect(snapshot.entries['llm_call']?.cost).toBe(0.5);
    expect(snapshot.total).toBeCloseTo(0.6, 10);
  });

  it('should signal the budget at the crossing record and never earlier', () => {
    const meter = new CostMeter({ prices: { call: 0.3 }, budgetLimit: 1 });

    expect(() => meter.record('call', 1)).not.toThrow();
    expect(() => meter.record('call', 1)).not.toThrow();
    expect(() => meter.record('call', 1)).not.toThrow();
    expect(meter.isExceeded()).toBe(false);

    expect(() => meter.record('call', 1)).toThrow(BudgetExceededError);
    expect(meter.isExceeded()).toBe(true);
  });

  it('should accrue the crossing cost before throwing', () => {
    const meter = new CostMeter({ prices: { call: 0.3 }, budgetLimit: 1 });
    for (let i = 0; i < 3; i++) meter.record('call', 1);

    let caught: unknown;
    try {
      meter.record('call', 1);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(BudgetExceededError);
    if (caught instanceof BudgetExceededError) {
      expect(caught.currentCost).toBeCloseTo(1.2, 10);
      expect(caught.budgetLimit).toBe(1);
      expect(caught.message).toBe('Budget exceeded: $1.20 / $1.00');
    }
    expect(meter.getTotal()).toBeCloseTo(1.2, 10);
  });

  it('should treat reaching the limit exactly as exceeding it', () => {
    const meter = new CostMeter({ prices: { call: 0.25 }, budgetLimit: 1 });
    for (let i = 0; i < 3; i++) meter.record('call', 1);

    expect(() => meter.record('call', 1)).toThrow(BudgetExceededError);
  });

  it('should keep throwing after the budget is spent', () => {
    const meter = new CostMeter({ prices: { call: 1 }, budgetLimit: 1 });

    expect(() => meter.record('call', 1)).toThrow(BudgetExceededError);
    expect(() => meter.record('call', 1)).toThrow(BudgetExceededError);
    expect(meter.getTotal()).toBe(2);
  });

  it('should emit budget:exceeded once', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.on('budget:exceeded', handler);
    const meter = new CostMeter({ prices: { call: 0.6 }, budgetLimit: 1, eventBus: bus });

    meter.record('call', 1);
    expect(() => meter.record('call', 1)).toThrow(BudgetExceededError);
    expect(() => meter.record('call', 1)).toThrow(BudgetExceededError);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'budget:exceeded', budgetLimit: 1, kind: 'call' }),
    );
  });

  it('should never enforce a budget when none is set', () => {
    const meter = new CostMeter({ prices: { call: 100 } });

    for (let i = 0; i < 10; i++) meter.record('call', 1);

    expect(meter.isExceeded()).toBe(false);
    expect(meter.snapshot()).toEqual({ entries: { call: { count: 10, units: 10, cost: 1000 } }, total: 1000 });
  });

  it('should reject unknown kinds and invalid quantities', () => {
    const meter = new CostMeter({ prices: { call: 1 } });

    expect(() => meter.record('tokens', 1)).toThrow("No unit price configured for 'tokens'");
    expect(() => meter.record('call', -1)).toThrow(RangeError);
    expect(() => meter.record('call', Number.NaN)).toThrow(RangeError);
    expect(meter.getTotal()).toBe(0);
  });

  it('should reject invalid prices and budgets', () => {
    expect(() => new CostMeter({ prices: { call: -1 } })).toThrow(RangeError);
    expect(() => new CostMeter({ prices: {}, budgetLimit: 0 })).toThrow(RangeError);
  });

  it('should return snapshots detached from later records', () => {
    const meter = new CostMeter({ prices: { call: 1 }, budgetLimit: 10 });
    meter.record('call', 1);

    const before = meter.snapshot();
    meter.record('call', 2);

    expect(before).toEqual({ entries: { call: { count: 1, units: 1, cost: 1 } }, total: 1, budgetLimit: 10 });
    expect(meter.snapshot().total).toBe(3);
    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.entries['call'])).toBe(true);
  });

  it('should clear everything on reset', () => {
    const meter = new CostMeter({ prices: { call: 1 }, budgetLimit: 1 });
    expect(() => meter.record('call', 1)).toThrow(BudgetExceededError);

    meter.reset();

    expect(meter.isExceeded()).toBe(false);
    expect(meter.snapshot()).toEqual({ entries: {}, total: 0, budgetLimit: 1 });
  });
});
