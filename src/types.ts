/**
 * Shared type definitions for the keyboard accessory toolbar.
 * The store, the component and the field classifier all exchange these shapes.
 */
export type AccessoryKind = "standard" | "creditCard" | "address" | "login";

export type AccessoryAction = "previous" | "next" | "done" | "useCard" | "useAddress" | "useLogin";

export type AccessoryHandler = () => void;

export type AccessoryHandlers = Partial<Record<AccessoryAction, AccessoryHandler>>;

export type ContextualButton = "card" | "address" | "login";

export type ToolbarItem =
  | { type: "contextual"; button: ContextualButton }
  | { type: "flexibleSpacer" }
  | { type: "previous" }
  | { type: "next" }
  | { type: "fixedSpacer"; width: number }
  | { type: "done" };

export type AccessibilityElement = ContextualButton | "previous" | "next" | "done";

export type ThemeName = "light" | "dark";

export interface ThemeColors {
  layer5: string;
  layer5Hover: string;
  iconAccentBlue: string;
  iconPrimary: string;
}

export interface Theme {
  name: ThemeName;
  colors: ThemeColors;
}

export interface ContextualTint {
  iconTint: string;
  background: string;
}

export interface ToolbarTint {
  background: string;
  navigationTint: string;
  contextual: Record<ContextualButton, ContextualTint>;
}

export interface TelemetryEvent {
  category: "action";
  method: "view";
  object: "creditCardAutofillPromptShown";
}
