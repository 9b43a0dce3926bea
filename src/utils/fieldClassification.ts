import type { AccessoryKind } from "../types";

export interface FieldDescriptor {
  autocomplete?: string | null;
  type?: string | null;
}

const SECTION_TOKENS = new Set(["shipping", "billing"]);

const ADDRESS_TOKENS = new Set([
  "street-address",
  "address-line1",
  "address-line2",
  "address-line3",
  "address-level1",
  "address-level2",
  "address-level3",
  "address-level4",
  "postal-code",
  "country",
  "country-name"
]);

const LOGIN_TOKENS = new Set(["username", "current-password", "new-password"]);

function fieldNameToken(autocomplete: string | null | undefined): string | undefined {
  if (!autocomplete) {
    return undefined;
  }
  return autocomplete
    .trim()
    .toLowerCase()
    .split(/\s+/)
    .find((token) => token.length > 0 && !token.startsWith("section-") && !SECTION_TOKENS.has(token));
}

/**
 * Map an input's autocomplete hint (and type, for password inputs) to the
 * contextual button the toolbar should offer.
 */
export function classifyField({ autocomplete, type }: FieldDescriptor): AccessoryKind {
  const token = fieldNameToken(autocomplete);

  if (token?.startsWith("cc-")) {
    return "creditCard";
  }
  if (token && ADDRESS_TOKENS.has(token)) {
    return "address";
  }
  if ((token && LOGIN_TOKENS.has(token)) || type?.toLowerCase() === "password") {
    return "login";
  }
  return "standard";
}
