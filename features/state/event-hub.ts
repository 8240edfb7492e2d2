export type EventListener<TEvent> = (event: TEvent) => void;
export type Unsubscribe = () => void;

/**
 * Synchronous fan-out to subscribers. An event is delivered to every
 * listener before `emit` returns, so observers see transitions in order.
 */
export class EventHub<TEvent> {
  private listeners = new Set<EventListener<TEvent>>();

  constructor(private readonly tag: string) {}

  subscribe(listener: EventListener<TEvent>): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  emit(event: TEvent): void {
    this.listeners.forEach((fn) => {
      try {
        fn(event);
      } catch (e) {
        console.error(`${this.tag} Event listener error:`, e);
      }
    });
  }

  clear(): void {
    this.listeners.clear();
  }

  get size(): number {
    return this.listeners.size;
  }
}
