import { createStore, type StoreApi } from "zustand/vanilla";

import { loadToolbarConfig, type ToolbarConfig } from "../config/toolbarConfig";
import { CREDIT_CARD_PROMPT_SHOWN, createConsoleTelemetry, type TelemetrySink } from "../telemetry/telemetry";
import type { ThemeChangeSource, ThemeProvider, Unsubscribe } from "../theme/themeManager";
import type {
  AccessibilityElement,
  AccessoryAction,
  AccessoryHandler,
  AccessoryHandlers,
  AccessoryKind,
  ContextualButton,
  ToolbarItem,
  ToolbarTint
} from "../types";
import { buildToolbarLayout, computeToolbarTint, contextualButtonFor } from "./layout";

export interface AccessoryToolbarDependencies {
  themeManager: ThemeProvider;
  notifications: ThemeChangeSource;
  telemetry?: TelemetrySink;
  config?: Partial<ToolbarConfig>;
  handlers?: AccessoryHandlers;
}

export interface AccessoryToolbarState {
  kind: AccessoryKind;
  contextual: ContextualButton | null;
  items: ToolbarItem[];
  accessibilityOrder: AccessibilityElement[];
  tint: ToolbarTint;
  handlers: AccessoryHandlers;
  attached: boolean;
  config: ToolbarConfig;
  reload: (kind: AccessoryKind) => void;
  applyTheme: () => void;
  attach: () => void;
  detach: () => void;
  setHandlers: (handlers: AccessoryHandlers) => void;
  setHandler: (action: AccessoryAction, handler: AccessoryHandler | undefined) => void;
  tap: (action: AccessoryAction) => void;
}

export type AccessoryToolbarStore = StoreApi<AccessoryToolbarState>;

/**
 * Create the toolbar for one keyboard-input session. The store subscribes to
 * theme changes right away and keeps the subscription until `detach`.
 */
export function createAccessoryToolbarStore({
  themeManager,
  notifications,
  telemetry,
  config: configOverrides,
  handlers = {}
}: AccessoryToolbarDependencies): AccessoryToolbarStore {
  const config = loadToolbarConfig(configOverrides);
  const sink = telemetry ?? createConsoleTelemetry({ enabled: config.telemetryEnabled });
  let themeSubscription: Unsubscribe | null = null;

  const store = createStore<AccessoryToolbarState>((set, get) => ({
    kind: "standard",
    contextual: null,
    ...buildToolbarLayout(null, config),
    tint: computeToolbarTint(themeManager.currentTheme),
    handlers: { ...handlers },
    attached: false,
    config,

    reload: (kind: AccessoryKind) => {
      const contextual = contextualButtonFor(kind);
      if (kind === "creditCard") {
        sink.recordEvent(CREDIT_CARD_PROMPT_SHOWN);
      }
      set({ kind, contextual, ...buildToolbarLayout(contextual, config) });
    },

    applyTheme: () => {
      set({ tint: computeToolbarTint(themeManager.currentTheme) });
    },

    attach: () => {
      if (!themeSubscription) {
        themeSubscription = notifications.onThemeChange(() => {
          get().applyTheme();
        });
      }
      set({ attached: true });
      get().applyTheme();
    },

    detach: () => {
      themeSubscription?.();
      themeSubscription = null;
      // A contextual button left over from the previous field would otherwise
      // reappear on the next attach, even for unrelated inputs.
      set({ kind: "standard", contextual: null, attached: false, ...buildToolbarLayout(null, config) });
    },

    setHandlers: (next: AccessoryHandlers) => {
      set({ handlers: { ...next } });
    },

    setHandler: (action: AccessoryAction, handler: AccessoryHandler | undefined) => {
      const next: AccessoryHandlers = { ...get().handlers };
      if (handler) {
        next[action] = handler;
      } else {
        delete next[action];
      }
      set({ handlers: next });
    },

    tap: (action: AccessoryAction) => {
      get().handlers[action]?.();
    }
  }));

  store.getState().attach();
  return store;
}
