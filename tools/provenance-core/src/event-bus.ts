import { EventEmitter } from "node:events";
import type { EventBus, EventListener, ProvenanceEvent } from "./types.js";

const CHANNEL = "event";

export class ProvenanceEventBus implements EventBus {
  private readonly emitter: EventEmitter;

  constructor(emitter?: EventEmitter) {
    this.emitter = emitter ?? new EventEmitter();
    this.emitter.setMaxListeners(20);
  }

  publish(event: ProvenanceEvent): void {
    this.emitter.emit(CHANNEL, event);
  }

  subscribe(listener: EventListener): () => void {
    this.emitter.on(CHANNEL, listener);
    return () => {
      this.emitter.off(CHANNEL, listener);
    };
  }

  listenerCount(): number {
    return this.emitter.listenerCount(CHANNEL);
  }
}

export function createEventBus(): ProvenanceEventBus {
  return new ProvenanceEventBus();
}

/**
 * Collect every event published on a bus until the returned stop function runs.
 */
export function recordEvents(bus: EventBus): { events: ProvenanceEvent[]; stop: () => void } {
  const events: ProvenanceEvent[] = [];
  const stop = bus.subscribe((event) => {
    events.push(event);
  });
  return { events, stop };
}
