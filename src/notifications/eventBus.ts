import type { Trade, EngineContext } from '../engine/types';
import { createLogger } from '../logger';
import type { Position } from '../positions/ledger';
import type { RiskState } from '../risk/riskGovernor';
import type { Signal } from '../signals/types';

const logger = createLogger('event-bus');

export type EngineEvent =
  | { type: 'position_update'; data: Position }
  | { type: 'trade_executed'; data: Trade }
  | { type: 'signal'; data: Signal }
  | { type: 'kill_switch'; data: { risk: RiskState; context: EngineContext } }
  | { type: 'system_status'; data: { status: EngineContext['status']; paused: boolean; reason?: string } };

export interface NotificationSink {
  /** Fire-and-forget. Never throws. */
  publish(event: EngineEvent): void;
}

export type EventListener = (event: EngineEvent & { ts: number }) => void;

/** In-process fan-out to dashboard listeners. A failing listener is logged and skipped. */
export class EventBus implements NotificationSink {
  private readonly listeners = new Set<EventListener>();

  publish(event: EngineEvent): void {
    const stamped = { ...event, ts: Date.now() };
    for (const listener of [...this.listeners]) {
      try {
        listener(stamped);
      } catch (err) {
        logger.warn({ err, type: event.type }, 'event listener failed');
      }
    }
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  listenerCount(): number {
    return this.listeners.size;
  }
}
