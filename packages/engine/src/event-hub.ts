import { errorMessage, type Logger } from "@hedgegrid/core";

type Handlers<Events> = { [K in keyof Events]?: Set<(payload: Events[K]) => void> };

/** Typed fan-out. A throwing listener is logged and skipped. */
export class EventHub<Events extends Record<string, unknown>> {
  private readonly handlers: Handlers<Events> = {};

  constructor(private readonly log: Logger) {}

  on<K extends keyof Events>(event: K, handler: (payload: Events[K]) => void): () => void {
    const set = this.handlers[event] ?? new Set<(payload: Events[K]) => void>();
    this.handlers[event] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        this.log.error({ err: errorMessage(error), event: String(event) }, "event listener failed");
      }
    }
  }
}
