/**
 * Event name -> listener argument tuple
 */
export type EventMap = Record<string, unknown[]>;

type Listener<Args extends unknown[]> = (...args: Args) => void;

/**
 * Minimal typed publish/subscribe channel
 */
export class EventBus<Events extends EventMap> {
  private listeners: { [E in keyof Events]?: Listener<Events[E]>[] } = {};

  public on<E extends keyof Events>(event: E, listener: Listener<Events[E]>): () => void {
    const list: Listener<Events[E]>[] = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;

    // Returns the unsubscribe function
    return () => {
      this.off(event, listener);
    };
  }

  public off<E extends keyof Events>(event: E, listener: Listener<Events[E]>): void {
    const list = this.listeners[event];
    if (!list) {
      return;
    }
    this.listeners[event] = list.filter((l) => l !== listener);
  }

  public emit<E extends keyof Events>(event: E, ...args: Events[E]): void {
    const list = this.listeners[event];
    if (!list) {
      return;
    }
    // Copy so listeners may unsubscribe while being notified
    [...list].forEach((listener) => {
      listener(...args);
    });
  }

  public listenerCount<E extends keyof Events>(event: E): number {
    return this.listeners[event]?.length ?? 0;
  }
}
