import { THEME_PRESETS, defaultTheme } from "./presets.js";
import type { Theme } from "./types.js";

export type { Theme, ThemeColors, ThemeStyle } from "./types.js";
export {
  THEME_PRESETS,
  crimsonTheme,
  cyberpunkTheme,
  defaultTheme,
  matrixTheme,
  monochromeTheme,
  neonTheme,
  oceanTheme,
  sunsetTheme,
} from "./presets.js";

export const DEFAULT_THEME_NAME = defaultTheme.name;

export function listThemes(): readonly string[] {
  return THEME_PRESETS.map((theme) => theme.name);
}

export function isThemeName(name: string): boolean {
  return THEME_PRESETS.some((theme) => theme.name === name);
}

/** Resolve a preset by name, falling back to the default theme. */
export function themeByName(name: string): Theme {
  return THEME_PRESETS.find((theme) => theme.name === name) ?? defaultTheme;
}

/** Step through presets in order, wrapping at both ends. */
export function cycleThemeName(current: string, step: 1 | -1 = 1): string {
  const names = listThemes();
  const index = names.indexOf(current);
  const base = index < 0 ? 0 : index;
  const next = (((base + step) % names.length) + names.length) % names.length;
  return names[next] ?? DEFAULT_THEME_NAME;
}
