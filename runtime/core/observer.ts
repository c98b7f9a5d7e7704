// runtime/core/observer.ts

import type { FlowEvent } from '../../core/types.ts';

/**
 * Receives run events in order. Fire-and-forget: sinks must not throw back into the run.
 */
export interface EventSink {
  emit(event: FlowEvent): void;
}

export const noopSink: EventSink = {
  emit() {
    // discard
  },
};

/** Records every event; used by tests and the CLI summary. */
export class MemorySink implements EventSink {
  readonly events: FlowEvent[] = [];

  emit(event: FlowEvent): void {
    this.events.push(event);
  }

  ofType<T extends FlowEvent['type']>(type: T): Array<Extract<FlowEvent, { type: T }>> {
    const out: Array<Extract<FlowEvent, { type: T }>> = [];
    for (const event of this.events) {
      if (isEventOfType(event, type)) out.push(event);
    }
    return out;
  }

  clear(): void {
    this.events.length = 0;
  }
}

function isEventOfType<T extends FlowEvent['type']>(event: FlowEvent, type: T): event is Extract<FlowEvent, { type: T }> {
  return event.type === type;
}

export function callbackSink(callback: (event: FlowEvent) => void): EventSink {
  return { emit: callback };
}

export function fanOut(...sinks: EventSink[]): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) sink.emit(event);
    },
  };
}
