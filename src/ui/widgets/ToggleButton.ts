/**
 * Toggle Button Widget
 *
 * On/off toggle button for the immediate mode UI system.
 */

import type { Rect } from "../../math/rect";
import type { Color } from "../../types/color";
import type { IdKey, WidgetId } from "../IdStack";
import type { UIContext } from "../UIContext";
import { pressable } from "./interaction";

/** Toggle button configuration */
export interface ToggleOptions {
  key?: IdKey;
  width?: number;
  height?: number;
  onColor?: Color; // Custom active background color
  offColor?: Color; // Custom inactive background color
}

/** Toggle button result */
export interface ToggleResult {
  id: WidgetId;
  bounds: Rect;
  toggled: boolean; // Was the button clicked since the last pass?
  /** Value after applying this pass's toggle */
  checked: boolean;
  isHovered: boolean;
  isPressed: boolean;
  isFocused: boolean;
}

/**
 * Render a toggle button. The caller owns the checked value and stores
 * the returned one.
 */
export function toggle(
  ui: UIContext,
  label: string,
  checked: boolean,
  options: ToggleOptions = {}
): ToggleResult {
  const { key, onColor, offColor } = options;
  const theme = ui.getTheme().toggle;

  const textSize = ui.measureText(label, theme.fontSize);
  const id = ui.widgetId(key);
  const rect = ui.allocate(id, {
    width: options.width ?? textSize.width + theme.padding * 2,
    height: options.height ?? textSize.height + theme.padding * 2,
  });

  const { isHovered, isPressed, isFocused, clicked } = pressable(ui, id, rect);
  const isOn = clicked ? !checked : checked;

  let bgColor: Color;
  if (isOn) {
    bgColor = onColor ?? (isHovered ? theme.onHover : theme.onBackground);
  } else {
    bgColor = offColor ?? (isHovered ? theme.offHover : theme.offBackground);
  }
  if (isPressed) {
    // Darken slightly when pressed
    bgColor = [bgColor[0] * 0.85, bgColor[1] * 0.85, bgColor[2] * 0.85, bgColor[3]];
  }

  ui.draw({
    kind: "frame",
    rect,
    style: {
      fill: bgColor,
      borderColor: theme.borderColor,
      borderWidth: 1,
      cornerRadius: theme.borderRadius,
    },
  });

  ui.draw({
    kind: "text",
    position: { x: rect.x + theme.padding, y: rect.y + theme.padding },
    text: label,
    size: {
      width: Math.max(0, rect.width - theme.padding * 2),
      height: Math.max(0, rect.height - theme.padding * 2),
    },
    style: {
      color: isOn ? theme.onTextColor : theme.offTextColor,
      fontSize: theme.fontSize,
      align: "center",
    },
  });

  return { id, bounds: rect, toggled: clicked, checked: isOn, isHovered, isPressed, isFocused };
}
