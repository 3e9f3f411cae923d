import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/core/events.js';
import type { FeedbackEvent } from '../../../src/personalization/types.js';

const EVENT: FeedbackEvent = {
  id: 'f1',
  insightId: 'i1',
  feedbackType: 'helpful',
  timestamp: '2026-03-01T08:00:00.000Z',
};

describe('EventBus', () => {
  it('delivers typed payloads to listeners', () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.on('feedback:recorded', listener);

    bus.emit('feedback:recorded', { event: EVENT });
    expect(listener).toHaveBeenCalledWith({ event: EVENT });
  });

  it('fires once listeners a single time', () => {
    const bus = new EventBus();
    const listener = vi.fn();
    bus.once('insight:degraded', listener);

    bus.emit('insight:degraded', { type: 'daily_brief', date: '2026-03-01', reason: 'timeout' });
    bus.emit('insight:degraded', { type: 'daily_brief', date: '2026-03-02', reason: 'timeout' });
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('stops delivering after off and removeAllListeners', () => {
    const bus = new EventBus();
    const a = vi.fn();
    const b = vi.fn();
    bus.on('feedback:recorded', a);
    bus.on('feedback:recorded', b);

    bus.off('feedback:recorded', a);
    bus.emit('feedback:recorded', { event: EVENT });
    bus.removeAllListeners();
    bus.emit('feedback:recorded', { event: EVENT });

    expect(a).not.toHaveBeenCalled();
    expect(b).toHaveBeenCalledTimes(1);
  });
});
