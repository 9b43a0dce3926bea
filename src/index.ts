export * from "./components/AccessoryToolbar";
export * from "./context/AccessoryToolbarContext";
export * from "./hooks/useFocusedFieldKind";
export * from "./state/accessoryToolbarStore";
export * from "./theme/themeManager";
export * from "./telemetry/telemetry";
export * from "./config/toolbarConfig";
export { THEMES, LIGHT_THEME, DARK_THEME } from "./theme/palettes";
export { classifyField, type FieldDescriptor } from "./utils/fieldClassification";
export { buildToolbarLayout, computeToolbarTint, contextualButtonFor } from "./state/layout";
export type * from "./types";
