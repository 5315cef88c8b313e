import type { DomainEvent } from "./events";

export type Listener<E> = (event: E) => void;
export type Unsubscribe = () => void;

/**
 * Synchronous fan-out of engine signals. Listeners run in subscription
 * order on the emitting call stack; nothing is queued or deferred.
 */
export class EventHub<E extends { kind: string } = DomainEvent> {
  private listeners: Array<Listener<E>> = [];

  subscribe(listener: Listener<E>): Unsubscribe {
    this.listeners = [...this.listeners, listener];
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  on<K extends E["kind"]>(
    kind: K,
    listener: Listener<Extract<E, { kind: K }>>,
  ): Unsubscribe {
    return this.subscribe((event) => {
      if (isKind(event, kind)) listener(event);
    });
  }

  emit(event: E): void {
    // Snapshot so listeners may (un)subscribe while we dispatch
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  get listenerCount(): number {
    return this.listeners.length;
  }
}

function isKind<E extends { kind: string }, K extends E["kind"]>(
  event: E,
  kind: K,
): event is Extract<E, { kind: K }> {
  return event.kind === kind;
}
