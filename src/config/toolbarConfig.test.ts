import { afterEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_TOOLBAR_CONFIG, loadToolbarConfig } from "./toolbarConfig";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("loadToolbarConfig", () => {
  it("returns the default layout constants when nothing is set", () => {
    expect(loadToolbarConfig({}, {})).toEqual({
      toolbarHeight: 50,
      fixedSpacerWidth: 10,
      fixedSpacerHeight: 30,
      leadingSpacerWidth: 2,
      trailingSpacerWidth: 3,
      doneButtonFontSize: 17,
      telemetryEnabled: true
    });
  });

  it("applies explicit overrides", () => {
    const config = loadToolbarConfig({ fixedSpacerWidth: 12, telemetryEnabled: false }, {});

    expect(config.fixedSpacerWidth).toBe(12);
    expect(config.telemetryEnabled).toBe(false);
    expect(config.toolbarHeight).toBe(DEFAULT_TOOLBAR_CONFIG.toolbarHeight);
  });

  it("reads telemetry and height settings from the environment", () => {
    const config = loadToolbarConfig(
      { telemetryEnabled: true },
      { ACCESSORY_TELEMETRY_ENABLED: " off ", ACCESSORY_TOOLBAR_HEIGHT: "44" }
    );

    expect(config.telemetryEnabled).toBe(false);
    expect(config.toolbarHeight).toBe(44);
  });

  it("keeps the fallback and warns for unrecognized boolean values", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    expect(loadToolbarConfig({}, { ACCESSORY_TELEMETRY_ENABLED: "maybe" }).telemetryEnabled).toBe(true);
    expect(warn).toHaveBeenCalledWith(
      '[AccessoryToolbar] Ignoring unrecognized ACCESSORY_TELEMETRY_ENABLED value "maybe"'
    );
  });

  it("keeps defaults for overrides that are explicitly undefined", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadToolbarConfig(
      { toolbarHeight: undefined, fixedSpacerWidth: undefined, telemetryEnabled: undefined },
      {}
    );

    expect(config).toEqual(DEFAULT_TOOLBAR_CONFIG);
    expect(warn).not.toHaveBeenCalled();
  });

  it("rejects NaN and non-positive overrides with a warning", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadToolbarConfig({ toolbarHeight: Number.NaN, fixedSpacerWidth: -4, doneButtonFontSize: 0 }, {});

    expect(config.toolbarHeight).toBe(50);
    expect(config.fixedSpacerWidth).toBe(10);
    expect(config.doneButtonFontSize).toBe(17);
    expect(warn).toHaveBeenCalledWith("[AccessoryToolbar] Ignoring invalid toolbarHeight override NaN");
    expect(warn).toHaveBeenCalledWith("[AccessoryToolbar] Ignoring invalid fixedSpacerWidth override -4");
    expect(warn).toHaveBeenCalledWith("[AccessoryToolbar] Ignoring invalid doneButtonFontSize override 0");
    expect(warn).toHaveBeenCalledTimes(3);
  });

  it.each(["44px", "12.9", "abc"])("warns and falls back on the non-integer height %s", (value) => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadToolbarConfig({ toolbarHeight: 60 }, { ACCESSORY_TOOLBAR_HEIGHT: value });

    expect(config.toolbarHeight).toBe(60);
    expect(warn).toHaveBeenCalledWith(`[AccessoryToolbar] Ignoring invalid ACCESSORY_TOOLBAR_HEIGHT "${value}"`);
  });

  it("warns and falls back on an invalid height", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const config = loadToolbarConfig({}, { ACCESSORY_TOOLBAR_HEIGHT: "-5" });

    expect(config.toolbarHeight).toBe(50);
    expect(warn).toHaveBeenCalledWith('[AccessoryToolbar] Ignoring invalid ACCESSORY_TOOLBAR_HEIGHT "-5"');
  });
});
