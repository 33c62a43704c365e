/**
 * UI Theme
 *
 * Configurable theme for the declarative widgets.
 * All colors are RGBA in 0-1 range.
 */

import type { Color } from "../types/color";

export interface ButtonTheme {
  background: Color;
  hover: Color;
  pressed: Color;
  disabled: Color;
  textColor: Color;
  fontSize: number;
  padding: number;
  borderRadius: number;
  borderColor: Color;
  /** Border color while the button holds keyboard focus */
  focusColor: Color;
  borderWidth: number;
}

export interface PanelTheme {
  background: Color;
  borderColor: Color;
  borderWidth: number;
  borderRadius: number;
  padding: number;
  spacing: number;
}

export interface LabelTheme {
  color: Color;
  fontSize: number;
}

export interface ToggleTheme {
  onBackground: Color;
  onHover: Color;
  offBackground: Color;
  offHover: Color;
  onTextColor: Color;
  offTextColor: Color;
  borderColor: Color;
  fontSize: number;
  padding: number;
  borderRadius: number;
}

export interface TextInputTheme {
  background: Color;
  focusBackground: Color;
  borderColor: Color;
  focusBorderColor: Color;
  textColor: Color;
  placeholderColor: Color;
  cursorColor: Color;
  fontSize: number;
  padding: number;
  width: number;
  borderRadius: number;
}

export interface ScrollbarTheme {
  trackColor: Color;
  thumbColor: Color;
  thumbHoverColor: Color;
  width: number;
  minThumbSize: number;
  borderRadius: number;
  /** Pixels scrolled per wheel unit */
  wheelStep: number;
}

export interface UITheme {
  button: ButtonTheme;
  panel: PanelTheme;
  label: LabelTheme;
  toggle: ToggleTheme;
  textInput: TextInputTheme;
  scrollbar: ScrollbarTheme;
}

/** Per-section partial overrides */
export type ThemeOverrides = { [K in keyof UITheme]?: Partial<UITheme[K]> };

/** Default dark theme with transparency */
export const DEFAULT_THEME: UITheme = {
  button: {
    background: [0.2, 0.2, 0.2, 0.9],
    hover: [0.3, 0.3, 0.3, 0.9],
    pressed: [0.15, 0.15, 0.15, 0.95],
    disabled: [0.15, 0.15, 0.15, 0.5],
    textColor: [1, 1, 1, 0.9],
    fontSize: 14,
    padding: 8,
    borderRadius: 4,
    borderColor: [0.4, 0.4, 0.4, 0.5],
    focusColor: [0.35, 0.6, 1, 1],
    borderWidth: 1,
  },
  panel: {
    background: [0.08, 0.08, 0.08, 0.92],
    borderColor: [0.3, 0.3, 0.3, 0.6],
    borderWidth: 1,
    borderRadius: 6,
    padding: 12,
    spacing: 5,
  },
  label: {
    color: [1, 1, 1, 0.9],
    fontSize: 14,
  },
  toggle: {
    onBackground: [0.2, 0.45, 0.8, 0.9],
    onHover: [0.25, 0.5, 0.85, 0.9],
    offBackground: [0.2, 0.2, 0.2, 0.9],
    offHover: [0.3, 0.3, 0.3, 0.9],
    onTextColor: [1, 1, 1, 1],
    offTextColor: [0.8, 0.8, 0.8, 0.9],
    borderColor: [0.4, 0.4, 0.4, 0.5],
    fontSize: 14,
    padding: 8,
    borderRadius: 4,
  },
  textInput: {
    background: [0.12, 0.12, 0.12, 0.9],
    focusBackground: [0.16, 0.16, 0.16, 0.95],
    borderColor: [0.35, 0.35, 0.35, 0.6],
    focusBorderColor: [0.35, 0.6, 1, 1],
    textColor: [1, 1, 1, 0.9],
    placeholderColor: [1, 1, 1, 0.35],
    cursorColor: [1, 1, 1, 0.9],
    fontSize: 14,
    padding: 6,
    width: 200,
    borderRadius: 3,
  },
  scrollbar: {
    trackColor: [0.15, 0.15, 0.15, 0.8],
    thumbColor: [0.4, 0.4, 0.4, 0.8],
    thumbHoverColor: [0.5, 0.5, 0.5, 0.9],
    width: 8,
    minThumbSize: 24,
    borderRadius: 4,
    wheelStep: 1,
  },
};

/** Deep merge a partial theme with the default theme */
export function mergeTheme(partial: ThemeOverrides): UITheme {
  return {
    button: { ...DEFAULT_THEME.button, ...partial.button },
    panel: { ...DEFAULT_THEME.panel, ...partial.panel },
    label: { ...DEFAULT_THEME.label, ...partial.label },
    toggle: { ...DEFAULT_THEME.toggle, ...partial.toggle },
    textInput: { ...DEFAULT_THEME.textInput, ...partial.textInput },
    scrollbar: { ...DEFAULT_THEME.scrollbar, ...partial.scrollbar },
  };
}
