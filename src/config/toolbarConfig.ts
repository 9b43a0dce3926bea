import { getEnv, parseBoolean, type EnvSource } from "../utils/env";

export const UX = {
  toolbarHeight: 50,
  fixedSpacerWidth: 10,
  fixedSpacerHeight: 30,
  fixedLeadingSpacerWidth: 2,
  fixedTrailingSpacerWidth: 3,
  doneButtonFontSize: 17
} as const;

export interface ToolbarConfig {
  toolbarHeight: number;
  fixedSpacerWidth: number;
  fixedSpacerHeight: number;
  leadingSpacerWidth: number;
  trailingSpacerWidth: number;
  doneButtonFontSize: number;
  telemetryEnabled: boolean;
}

export const DEFAULT_TOOLBAR_CONFIG: ToolbarConfig = {
  toolbarHeight: UX.toolbarHeight,
  fixedSpacerWidth: UX.fixedSpacerWidth,
  fixedSpacerHeight: UX.fixedSpacerHeight,
  leadingSpacerWidth: UX.fixedLeadingSpacerWidth,
  trailingSpacerWidth: UX.fixedTrailingSpacerWidth,
  doneButtonFontSize: UX.doneButtonFontSize,
  telemetryEnabled: true
};

type LayoutDimension = Exclude<keyof ToolbarConfig, "telemetryEnabled">;

const LAYOUT_DIMENSIONS: readonly LayoutDimension[] = [
  "toolbarHeight",
  "fixedSpacerWidth",
  "fixedSpacerHeight",
  "leadingSpacerWidth",
  "trailingSpacerWidth",
  "doneButtonFontSize"
];

function isPositiveNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value > 0;
}

function parseHeight(value: string | undefined, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[AccessoryToolbar] Ignoring invalid ACCESSORY_TOOLBAR_HEIGHT "${value}"`);
    return fallback;
  }
  return parsed;
}

/**
 * Copy the overrides that hold usable values onto `base`. Unset entries keep
 * the default; anything else that is not a positive number (or a boolean for
 * `telemetryEnabled`) is reported and skipped.
 */
function mergeOverrides(base: ToolbarConfig, overrides: Partial<ToolbarConfig>): ToolbarConfig {
  const merged: ToolbarConfig = { ...base };

  for (const key of LAYOUT_DIMENSIONS) {
    const value = overrides[key];
    if (value === undefined) {
      continue;
    }
    if (isPositiveNumber(value)) {
      merged[key] = value;
    } else {
      console.warn(`[AccessoryToolbar] Ignoring invalid ${key} override ${String(value)}`);
    }
  }

  const { telemetryEnabled } = overrides;
  if (typeof telemetryEnabled === "boolean") {
    merged.telemetryEnabled = telemetryEnabled;
  } else if (telemetryEnabled !== undefined) {
    console.warn(`[AccessoryToolbar] Ignoring invalid telemetryEnabled override ${String(telemetryEnabled)}`);
  }

  return merged;
}

/**
 * Resolve toolbar settings from defaults, explicit overrides and the environment.
 * Environment values win over overrides so deployers can adjust a build without code changes.
 */
export function loadToolbarConfig(
  overrides: Partial<ToolbarConfig> = {},
  env?: EnvSource
): ToolbarConfig {
  const merged = mergeOverrides(DEFAULT_TOOLBAR_CONFIG, overrides);

  merged.telemetryEnabled = parseBoolean(
    getEnv("ACCESSORY_TELEMETRY_ENABLED", env),
    merged.telemetryEnabled,
    "ACCESSORY_TELEMETRY_ENABLED"
  );
  merged.toolbarHeight = parseHeight(getEnv("ACCESSORY_TOOLBAR_HEIGHT", env), merged.toolbarHeight);

  return merged;
}
