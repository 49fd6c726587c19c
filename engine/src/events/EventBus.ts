import { LogCategory } from '../types/log-types.js';
import type { EngineLogger } from '../core/EngineLogger.js';
import { LoggerManager } from '../logging/LoggerManager.js';
import { errorMessage } from '../errors/FlowError.js';
import { isEventOf, type EngineEventType, type FlowEvent } from './EngineEvents.js';

/**
 * Event handler function signature
 */
export type EventHandler<T extends EngineEventType = EngineEventType> = (
  event: FlowEvent<T>
) => void | Promise<void>;

type Listener = (event: FlowEvent) => void | Promise<void>;

/**
 * EventBus - Central pub/sub system for the flow engine
 *
 * Design Philosophy:
 * - Simple: Map-based lookup, no complex routing
 * - Synchronous dispatch: emitting never suspends the run controller
 * - Error-isolated: a handler that throws or rejects is logged and skipped
 * - Wildcard support: listen to all events with onAny()
 *
 * @example
 * ```ts
 * const bus = new EventBus();
 *
 * bus.on(EngineEventType.NODE_STATUS_CHANGED, event => {
 *   console.log(event.payload.nodeId, event.payload.to);
 * });
 *
 * bus.onAny(event => audit.record(event));
 * ```
 */
export class EventBus {
  private listeners: Map<string, Listener[]> = new Map();
  private wildcardListeners: Listener[] = [];

  constructor(private readonly logger: EngineLogger = LoggerManager.getLogger()) {}

  /**
   * Subscribe to events of a specific type
   *
   * @returns Unsubscribe function
   */
  on<T extends EngineEventType>(eventType: T, handler: EventHandler<T>): () => void {
    const listener: Listener = event => (isEventOf(event, eventType) ? handler(event) : undefined);
    const handlers = this.listeners.get(eventType) ?? [];
    handlers.push(listener);
    this.listeners.set(eventType, handlers);

    return () => {
      const current = this.listeners.get(eventType);
      if (current) {
        const index = current.indexOf(listener);
        if (index !== -1) {
          current.splice(index, 1);
        }
      }
    };
  }

  /**
   * Subscribe to every event
   *
   * @returns Unsubscribe function
   */
  onAny(handler: EventHandler): () => void {
    this.wildcardListeners.push(handler);
    return () => {
      this.wildcardListeners = this.wildcardListeners.filter(l => l !== handler);
    };
  }

  /**
   * Subscribe to an event, but only fire once then auto-unsubscribe
   */
  once<T extends EngineEventType>(eventType: T, handler: EventHandler<T>): () => void {
    const unsubscribe = this.on(eventType, (event: FlowEvent<T>) => {
      unsubscribe();
      return handler(event);
    });
    return unsubscribe;
  }

  /**
   * Dispatch an event to all subscribed handlers in registration order.
   * Async handlers are not awaited; their rejections are logged.
   */
  emit(event: FlowEvent): void {
    const handlers = [...(this.listeners.get(event.type) ?? []), ...this.wildcardListeners];

    for (const handler of handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          result.catch((error: unknown) => this.reportHandlerError(event, error));
        }
      } catch (error) {
        this.reportHandlerError(event, error);
      }
    }
  }

  /**
   * Remove all handlers for a specific event type
   */
  off(eventType: EngineEventType): void {
    this.listeners.delete(eventType);
  }

  clear(): void {
    this.listeners.clear();
    this.wildcardListeners = [];
  }

  listenerCount(eventType: EngineEventType): number {
    return (this.listeners.get(eventType) ?? []).length;
  }

  hasListeners(eventType: EngineEventType): boolean {
    return this.listenerCount(eventType) > 0 || this.wildcardListeners.length > 0;
  }

  private reportHandlerError(event: FlowEvent, error: unknown): void {
    this.logger.warn(
      `Event handler for "${event.type}" failed: ${errorMessage(error)}`,
      { runId: event.runId, eventType: event.type },
      LogCategory.RUNTIME
    );
  }
}
