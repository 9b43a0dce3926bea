import { afterEach, describe, expect, it, vi } from "vitest";

import {
  CREDIT_CARD_PROMPT_SHOWN,
  createConsoleTelemetry,
  createMemoryTelemetry,
  formatTelemetryEvent
} from "./telemetry";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("telemetry sinks", () => {
  it("formats events with the telemetry tag", () => {
    expect(formatTelemetryEvent(CREDIT_CARD_PROMPT_SHOWN)).toBe(
      "[Telemetry] action.view creditCardAutofillPromptShown"
    );
  });

  it("logs events through console.info when enabled", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    createConsoleTelemetry().recordEvent(CREDIT_CARD_PROMPT_SHOWN);

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith("[Telemetry] action.view creditCardAutofillPromptShown");
  });

  it("stays silent when disabled", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => {});

    createConsoleTelemetry({ enabled: false }).recordEvent(CREDIT_CARD_PROMPT_SHOWN);

    expect(info).not.toHaveBeenCalled();
  });

  it("buffers events in memory until cleared", () => {
    const sink = createMemoryTelemetry();

    sink.recordEvent(CREDIT_CARD_PROMPT_SHOWN);
    expect(sink.events).toEqual([CREDIT_CARD_PROMPT_SHOWN]);

    sink.clear();
    expect(sink.events).toEqual([]);
  });
});
