import type { TelemetryEvent } from "../types";

export interface TelemetrySink {
  recordEvent: (event: TelemetryEvent) => void;
}

export const CREDIT_CARD_PROMPT_SHOWN: TelemetryEvent = {
  category: "action",
  method: "view",
  object: "creditCardAutofillPromptShown"
};

export function formatTelemetryEvent(event: TelemetryEvent): string {
  return `[Telemetry] ${event.category}.${event.method} ${event.object}`;
}

interface ConsoleTelemetryOptions {
  enabled?: boolean;
}

export function createConsoleTelemetry({ enabled = true }: ConsoleTelemetryOptions = {}): TelemetrySink {
  return {
    recordEvent: (event) => {
      if (!enabled) {
        return;
      }
      console.info(formatTelemetryEvent(event));
    }
  };
}

export interface MemoryTelemetrySink extends TelemetrySink {
  readonly events: readonly TelemetryEvent[];
  clear: () => void;
}

/**
 * Buffers events so the owner can flush them in batches.
 */
export function createMemoryTelemetry(): MemoryTelemetrySink {
  let events: TelemetryEvent[] = [];

  return {
    get events() {
      return events;
    },
    recordEvent: (event) => {
      events = [...events, { ...event }];
    },
    clear: () => {
      events = [];
    }
  };
}
