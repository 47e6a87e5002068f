import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { EventBus } from '../../../src/application/EventBus.js';
import type { LeaseReleasedEvent, ChunkCommittedEvent } from '../../../src/domain/events/DomainEvents.js';

function released(): LeaseReleasedEvent {
  return { type: 'lease:released', resourceId: 'analytics.daily_prices', holderToken: 'token-1', timestamp: 1 };
}

function committed(): ChunkCommittedEvent {
  return {
    type: 'chunk:committed',
    destination: 'analytics.daily_prices',
    chunkIndex: 0,
    insertedCount: 10,
    updatedCount: 0,
    rejectedCount: 0,
    timestamp: 2,
  };
}

describe('EventBus', () => {
  it('should emit events to registered handlers', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('lease:released', handler);

    const event = released();
    bus.emit(event);

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith(event);
  });

  it('should not call handlers for different event types', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('lease:released', handler);
    bus.emit(committed());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should support multiple handlers for the same event', () => {
    const bus = new EventBus();
    const handler1 = vi.fn();
    const handler2 = vi.fn();

    bus.on('chunk:committed', handler1);
    bus.on('chunk:committed', handler2);
    bus.emit(committed());

    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should remove handlers with off()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.on('lease:released', handler);
    bus.off('lease:released', handler);
    bus.emit(released());

    expect(handler).not.toHaveBeenCalled();
  });

  it('should continue calling other handlers when one throws', () => {
    const bus = new EventBus();
    const handler1 = vi.fn(() => {
      throw new Error('first handler fails');
    });
    const handler2 = vi.fn();

    bus.on('lease:released', handler1);
    bus.on('lease:released', handler2);

    expect(() => bus.emit(released())).not.toThrow();
    expect(handler1).toHaveBeenCalledOnce();
    expect(handler2).toHaveBeenCalledOnce();
  });

  it('should log handler failures', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'error' }, { write: (line: string) => lines.push(line) });
    const bus = new EventBus(logger);

    bus.on('lease:released', () => {
      throw new Error('handler exploded');
    });
    bus.emit(released());

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]!);
    expect(entry).toMatchObject({ msg: 'event_handler_failed', eventType: 'lease:released' });
  });

  it('should call onAny handlers for every event type', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);

    const first = released();
    const second = committed();
    bus.emit(first);
    bus.emit(second);

    expect(handler).toHaveBeenCalledTimes(2);
    expect(handler).toHaveBeenCalledWith(first);
    expect(handler).toHaveBeenCalledWith(second);
  });

  it('should remove onAny handlers with offAny()', () => {
    const bus = new EventBus();
    const handler = vi.fn();

    bus.onAny(handler);
    bus.offAny(handler);
    bus.emit(released());

    expect(handler).not.toHaveBeenCalled();
  });
});
