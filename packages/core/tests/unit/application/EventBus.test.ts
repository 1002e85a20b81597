import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/application/EventBus.js';
import type { ItemSkippedEvent, ChunkStartedEvent } from '../../../src/domain/events/DomainEvents.js';
import { recordingLogger } from '../../helpers.js';

const skipped: ItemSkippedEvent = {
  type: 'item:skipped',
  batchId: 'batch-1',
  identity: 'acme',
  reason: 'already_processed',
  timestamp: 1,
};

const chunkStarted: ChunkStartedEvent = {
  type: 'chunk:started',
  batchId: 'batch-1',
  chunkIndex: 0,
  itemCount: 4,
  timestamp: 2,
};

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('item:skipped', handler);
    bus.emit(skipped);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(skipped);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('item:skipped', handler);
    bus.emit(chunkStarted);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('item:skipped', handler1);
    bus.on('item:skipped', handler2);
    bus.emit(skipped);

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('item:skipped', handler);
    bus.off('item:skipped', handler);
    bus.emit(skipped);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should keep calling other handlers when one throws, and log the failure', () => {
    const { logger, entries } = recordingLogger();
    const bus = new EventBus(logger);
    const handler = vi.fn();

    bus.on('item:skipped', () => {
      throw new Error('handler exploded');
    });
    bus.on('item:skipped', handler);

    expect(() => {
      bus.emit(skipped);
    }).not.toThrow();
    expect(handler).toHaveBeenCalledOnce();
    expect(entries).toEqual([
      { level: 'warn', msg: 'Event handler threw', extra: { event: 'item:skipped', error: 'handler exploded' } },
    ]);
  });

  it('should call onAny handlers for every event type', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.emit(skipped);
    bus.emit(chunkStarted);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenNthCalledWith(1, skipped);
    expect(handler).toHaveBeenNthCalledWith(2, chunkStarted);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(skipped);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should call both typed and wildcard handlers', () => {
    const bus = new EventBus();
    const typed = vi.fn();
    const wildcard = vi.fn();

    bus.on('chunk:started', typed);
    bus.onAny(wildcard);
    bus.emit(chunkStarted);

    expect(typed).toHaveBeenCalledOnce();
    expect(wildcard).toHaveBeenCalledOnce();
  });
});
