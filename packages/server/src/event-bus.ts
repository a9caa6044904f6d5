import { errorMessage, type LogEvent, type LogEventKind, type LogEventOf } from "@bedrock-herald/shared";

export type EventHandler<K extends LogEventKind> = (event: LogEventOf<K>) => void | Promise<void>;

type Listener = (event: LogEvent) => void | Promise<void>;

function isKind<K extends LogEventKind>(event: LogEvent, kind: K): event is LogEventOf<K> {
  return event.kind === kind;
}

/**
 * In-process publish/subscribe for log events.
 *
 * `publish` calls every handler registered for the event's kind, in
 * registration order, before it returns. A handler that throws (or returns a
 * promise that rejects) is logged and skipped; the remaining handlers still
 * run and the publisher never sees the error.
 */
export class EventBus {
  private readonly listeners = new Map<LogEventKind, Listener[]>();

  subscribe<K extends LogEventKind>(kind: K, handler: EventHandler<K>): () => void {
    const listener: Listener = (event) => (isKind(event, kind) ? handler(event) : undefined);
    const list = this.listeners.get(kind) ?? [];
    list.push(listener);
    this.listeners.set(kind, list);

    return () => {
      const current = this.listeners.get(kind);
      if (!current) return;
      const index = current.indexOf(listener);
      if (index !== -1) current.splice(index, 1);
    };
  }

  /** Deliver one event. Returns how many handlers it was handed to. */
  publish(event: LogEvent): number {
    const list = this.listeners.get(event.kind);
    if (!list || list.length === 0) return 0;

    // Snapshot: a handler may unsubscribe while we iterate.
    const snapshot = [...list];
    for (const listener of snapshot) {
      try {
        const result = listener(event);
        if (result instanceof Promise) {
          result.catch((err: unknown) => this.reportFault(event.kind, err));
        }
      } catch (err) {
        this.reportFault(event.kind, err);
      }
    }
    return snapshot.length;
  }

  /** Deliver a poll batch in detection order. */
  publishAll(events: Iterable<LogEvent>): number {
    let delivered = 0;
    for (const event of events) delivered += this.publish(event);
    return delivered;
  }

  listenerCount(kind: LogEventKind): number {
    return this.listeners.get(kind)?.length ?? 0;
  }

  private reportFault(kind: LogEventKind, err: unknown): void {
    console.error(`[BUS] ${kind} handler failed: ${errorMessage(err)}`);
  }
}
