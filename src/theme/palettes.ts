import type { Theme, ThemeName } from "../types";

export const LIGHT_THEME: Theme = {
  name: "light",
  colors: {
    layer5: "#fbfbfe",
    layer5Hover: "#e0e0e6",
    iconAccentBlue: "#0060df",
    iconPrimary: "#15141a"
  }
};

export const DARK_THEME: Theme = {
  name: "dark",
  colors: {
    layer5: "#2b2a33",
    layer5Hover: "#52525e",
    iconAccentBlue: "#00ddff",
    iconPrimary: "#fbfbfe"
  }
};

export const THEMES: Record<ThemeName, Theme> = {
  light: LIGHT_THEME,
  dark: DARK_THEME
};
