import { EventEmitter } from 'eventemitter3';
import type { InsightRecord } from '../insights/types.js';
import type { FeedbackEvent } from '../personalization/types.js';
import type { PatternRecord } from '../analysis/types.js';
import type { FailureReason } from '../gateway/types.js';

export interface VitalsenseEvents {
  'insight:persisted': { insight: InsightRecord; regenerated: boolean };
  'insight:degraded': { type: InsightRecord['type']; date: string; reason: FailureReason };
  'patterns:detected': { active: PatternRecord[]; created: number; deactivated: number };
  'feedback:recorded': { event: FeedbackEvent };
}

export class EventBus {
  private emitter = new EventEmitter();

  on<K extends keyof VitalsenseEvents>(event: K, listener: (data: VitalsenseEvents[K]) => void): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof VitalsenseEvents>(event: K, listener: (data: VitalsenseEvents[K]) => void): void {
    this.emitter.off(event, listener);
  }

  once<K extends keyof VitalsenseEvents>(event: K, listener: (data: VitalsenseEvents[K]) => void): void {
    this.emitter.once(event, listener);
  }

  emit<K extends keyof VitalsenseEvents>(event: K, data: VitalsenseEvents[K]): void {
    this.emitter.emit(event, data);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
