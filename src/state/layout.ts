import type { ToolbarConfig } from "../config/toolbarConfig";
import { KEYBOARD_ACCESSORY_IDS } from "../resources/accessibilityIdentifiers";
import { ICONS } from "../resources/icons";
import { KEYBOARD_ACCESSORY_STRINGS } from "../resources/strings";
import type {
  AccessibilityElement,
  AccessoryAction,
  AccessoryKind,
  ContextualButton,
  Theme,
  ToolbarItem,
  ToolbarTint
} from "../types";

export interface ContextualButtonDescriptor {
  action: AccessoryAction;
  icon: string;
  label: string;
  accessibilityId: string;
}

export const CONTEXTUAL_BUTTONS: Record<ContextualButton, ContextualButtonDescriptor> = {
  card: {
    action: "useCard",
    icon: ICONS.creditCard,
    label: KEYBOARD_ACCESSORY_STRINGS.useSavedCard,
    accessibilityId: KEYBOARD_ACCESSORY_IDS.creditCardAutofillButton
  },
  address: {
    action: "useAddress",
    icon: ICONS.location,
    label: KEYBOARD_ACCESSORY_STRINGS.useSavedAddress,
    accessibilityId: KEYBOARD_ACCESSORY_IDS.addressAutofillButton
  },
  login: {
    action: "useLogin",
    icon: ICONS.login,
    label: KEYBOARD_ACCESSORY_STRINGS.useSavedPassword,
    accessibilityId: KEYBOARD_ACCESSORY_IDS.loginAutofillButton
  }
};

export function contextualButtonFor(kind: AccessoryKind): ContextualButton | null {
  switch (kind) {
    case "standard":
      return null;
    case "creditCard":
      return "card";
    case "address":
      return "address";
    case "login":
      return "login";
  }
}

export interface ToolbarLayout {
  items: ToolbarItem[];
  accessibilityOrder: AccessibilityElement[];
}

/**
 * Build the toolbar item list for the current contextual button.
 * An absent contextual button is left out rather than rendered empty.
 */
export function buildToolbarLayout(
  contextual: ContextualButton | null,
  config: Pick<ToolbarConfig, "fixedSpacerWidth">
): ToolbarLayout {
  const leading: ToolbarItem[] = contextual ? [{ type: "contextual", button: contextual }] : [];
  const items: ToolbarItem[] = [
    ...leading,
    { type: "flexibleSpacer" },
    { type: "previous" },
    { type: "next" },
    { type: "fixedSpacer", width: config.fixedSpacerWidth },
    { type: "done" }
  ];

  const accessibilityOrder: AccessibilityElement[] = [];
  for (const item of items) {
    if (item.type === "contextual") {
      accessibilityOrder.push(item.button);
    } else if (item.type === "previous" || item.type === "next" || item.type === "done") {
      accessibilityOrder.push(item.type);
    }
  }

  return { items, accessibilityOrder };
}

export function computeToolbarTint(theme: Theme): ToolbarTint {
  const { colors } = theme;
  const contextualTint = () => ({ iconTint: colors.iconPrimary, background: colors.layer5Hover });

  return {
    background: colors.layer5,
    navigationTint: colors.iconAccentBlue,
    contextual: {
      card: contextualTint(),
      address: contextualTint(),
      login: contextualTint()
    }
  };
}
