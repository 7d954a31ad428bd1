/**
 * Engine Event Bus
 *
 * Typed event emitter for record lifecycle, migration and recommendation
 * events. One bus per engine instance; listeners must not throw.
 *
 * @module engine/events
 */
import { EventEmitter } from 'events';

// =============================================================================
// EVENT TYPE DEFINITIONS
// =============================================================================

export type EngineEventType =
  | 'record.ingested'
  | 'record.rescraped'
  | 'record.degraded'
  | 'record.repaired'
  | 'record.review_required'
  | 'migration.completed'
  | 'migration.failed'
  | 'recommendation.created'
  | 'recommendation.applied';

export const ENGINE_EVENT_TYPES: readonly EngineEventType[] = [
  'record.ingested',
  'record.rescraped',
  'record.degraded',
  'record.repaired',
  'record.review_required',
  'migration.completed',
  'migration.failed',
  'recommendation.created',
  'recommendation.applied',
] as const;

export interface EngineEvent {
  type: EngineEventType;
  timestamp: string;
  /** Record or recommendation id */
  entityId: string;
  data: Record<string, unknown>;
}

// =============================================================================
// EVENT BUS
// =============================================================================

export class EngineEventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(100);
  }

  emitEvent(event: EngineEvent): void {
    console.error(`[EventBus] ${event.type}: ${event.entityId}`);
    this.emit(event.type, event);
    this.emit('*', event);
  }

  onEvent(type: EngineEventType | '*', handler: (event: EngineEvent) => void): void {
    this.on(type, handler);
  }

  onceEvent(type: EngineEventType, handler: (event: EngineEvent) => void): void {
    this.once(type, handler);
  }

  offEvent(type: EngineEventType | '*', handler: (event: EngineEvent) => void): void {
    this.off(type, handler);
  }
}
