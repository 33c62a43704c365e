/**
 * Button Widget
 *
 * Clickable button for the immediate mode UI system.
 */

import type { Rect } from "../../math/rect";
import type { Color } from "../../types/color";
import type { IdKey, WidgetId } from "../IdStack";
import type { UIContext } from "../UIContext";
import { pressable } from "./interaction";

/** Button configuration */
export interface ButtonOptions {
  /** Disambiguator that keeps the id stable when siblings move */
  key?: IdKey;
  disabled?: boolean;
  width?: number;
  height?: number;
}

/** Button result */
export interface ButtonResult {
  id: WidgetId;
  bounds: Rect;
  clicked: boolean;
  isHovered: boolean;
  isPressed: boolean;
  isFocused: boolean;
}

/**
 * Render a clickable button.
 */
export function button(ui: UIContext, label: string, options: ButtonOptions = {}): ButtonResult {
  const { key, disabled = false } = options;
  const theme = ui.getTheme().button;

  const textSize = ui.measureText(label, theme.fontSize);
  const id = ui.widgetId(key);
  const rect = ui.allocate(id, {
    width: options.width ?? textSize.width + theme.padding * 2,
    height: options.height ?? textSize.height + theme.padding * 2,
  });

  const { isHovered, isPressed, isFocused, clicked } = pressable(ui, id, rect, { disabled });

  // Determine background color based on state
  let bgColor: Color = theme.background;
  if (disabled) {
    bgColor = theme.disabled;
  } else if (isPressed) {
    bgColor = theme.pressed;
  } else if (isHovered) {
    bgColor = theme.hover;
  }

  ui.draw({
    kind: "frame",
    rect,
    style: {
      fill: bgColor,
      borderColor: isFocused ? theme.focusColor : theme.borderColor,
      borderWidth: theme.borderWidth,
      cornerRadius: theme.borderRadius,
    },
  });

  // Label centered in the padded box
  ui.draw({
    kind: "text",
    position: { x: rect.x + theme.padding, y: rect.y + theme.padding },
    text: label,
    size: {
      width: Math.max(0, rect.width - theme.padding * 2),
      height: Math.max(0, rect.height - theme.padding * 2),
    },
    style: { color: theme.textColor, fontSize: theme.fontSize, align: "center" },
  });

  return { id, bounds: rect, clicked, isHovered, isPressed, isFocused };
}
