export type EnvSource = Record<string, string | undefined>;

function processEnv(): EnvSource {
  const globalProcess = (globalThis as { process?: { env?: EnvSource } }).process;
  return globalProcess?.env ?? {};
}

/**
 * Read a trimmed environment value. Blank strings count as unset.
 */
export function getEnv(name: string, env: EnvSource = processEnv()): string | undefined {
  const value = env[name];
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

const TRUE_VALUES = ["true", "1", "yes", "on"];
const FALSE_VALUES = ["false", "0", "no", "off"];

/**
 * Parse a boolean flag. Unrecognized spellings keep `fallback`; when `name`
 * is given they are reported so a typo in a deployment does not go unnoticed.
 */
export function parseBoolean(value: string | undefined, fallback: boolean, name?: string): boolean {
  if (typeof value !== "string") {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  if (name) {
    console.warn(`[AccessoryToolbar] Ignoring unrecognized ${name} value "${value}"`);
  }
  return fallback;
}
