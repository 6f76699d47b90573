import type { EventType, EventPayload, DomainEvent } from '../domain/events/DomainEvents.js';

type EventHandler<T extends EventType> = (event: EventPayload<T>) => void;

type WildcardHandler = (event: DomainEvent) => void;

/** Called with whatever a subscriber threw, and the event it was handling. */
export type HandlerErrorListener = (error: unknown, event: DomainEvent) => void;

/** Typed event bus for sniffing events. Subscribe with `on()`, publish with `emit()`. */
export class EventBus {
  /** Per event type: the subscriber as registered, and its type-checked wrapper. */
  private readonly handlers = new Map<EventType, Map<object, WildcardHandler>>();
  private readonly wildcardHandlers = new Set<WildcardHandler>();

  constructor(private readonly onHandlerError?: HandlerErrorListener) {}

  /** Subscribe to events of the given type. */
  on<T extends EventType>(type: T, handler: EventHandler<T>): void {
    const existing = this.handlers.get(type) ?? new Map<object, WildcardHandler>();
    if (!existing.has(handler)) existing.set(handler, this.wrap(type, handler));
    this.handlers.set(type, existing);
  }

  /** Subscribe to all events regardless of type. */
  onAny(handler: WildcardHandler): void {
    this.wildcardHandlers.add(handler);
  }

  /** Unsubscribe a previously registered handler. */
  off<T extends EventType>(type: T, handler: EventHandler<T>): void {
    this.handlers.get(type)?.delete(handler);
  }

  /** Unsubscribe a wildcard handler. */
  offAny(handler: WildcardHandler): void {
    this.wildcardHandlers.delete(handler);
  }

  /**
   * Emit an event to all registered handlers. A throwing handler does not prevent
   * the others from running, nor fail the sniff; its error goes to the
   * `onHandlerError` listener.
   */
  emit(event: DomainEvent): void {
    const handlers = this.handlers.get(event.type)?.values() ?? [];
    for (const handler of [...handlers, ...this.wildcardHandlers]) {
      try {
        handler(event);
      } catch (error) {
        this.onHandlerError?.(error, event);
      }
    }
  }

  private wrap<T extends EventType>(type: T, handler: EventHandler<T>): WildcardHandler {
    return (event) => {
      if (isEventOf(type, event)) handler(event);
    };
  }
}

function isEventOf<T extends EventType>(type: T, event: DomainEvent): event is EventPayload<T> {
  return event.type === type;
}
