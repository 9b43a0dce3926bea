import { createStore } from "zustand/vanilla";

import type { Theme, ThemeName } from "../types";
import { THEMES } from "./palettes";

export type ThemeChangeListener = (theme: Theme) => void;

export type Unsubscribe = () => void;

/**
 * Read side of the theme subsystem: the palette currently in effect.
 */
export interface ThemeProvider {
  readonly currentTheme: Theme;
}

/**
 * Push side of the theme subsystem: notifies when the active theme changes.
 */
export interface ThemeChangeSource {
  onThemeChange: (listener: ThemeChangeListener) => Unsubscribe;
}

export interface ThemeManager extends ThemeProvider, ThemeChangeSource {
  setTheme: (name: ThemeName) => void;
}

interface ThemeState {
  theme: Theme;
}

export function createThemeManager(initial: ThemeName = "light"): ThemeManager {
  const store = createStore<ThemeState>(() => ({ theme: THEMES[initial] }));

  return {
    get currentTheme() {
      return store.getState().theme;
    },
    setTheme: (name: ThemeName) => {
      store.setState({ theme: THEMES[name] });
    },
    onThemeChange: (listener: ThemeChangeListener) =>
      store.subscribe((state, previous) => {
        if (state.theme.name !== previous.theme.name) {
          listener(state.theme);
        }
      })
  };
}
