import type { Rect } from "../../math/rect";
import type { WidgetId } from "../IdStack";
import type { UIContext } from "../UIContext";

export interface PressableState {
  isHovered: boolean;
  isPressed: boolean;
  isFocused: boolean;
  clicked: boolean;
}

export interface PressableOptions {
  disabled?: boolean;
  focusable?: boolean;
}

/** Keys that activate a focused pressable */
const ACTIVATION_KEYS = new Set(["Enter", " "]);

/**
 * Register a widget as hit-testable and read back what happened to it
 * since the previous pass. A disabled widget still occludes what lies
 * beneath it but never reports interaction.
 */
export function pressable(
  ui: UIContext,
  id: WidgetId,
  rect: Rect,
  options: PressableOptions = {}
): PressableState {
  const { disabled = false, focusable = true } = options;
  ui.addTarget(id, rect, { focusable: focusable && !disabled });

  if (disabled) {
    return { isHovered: false, isPressed: false, isFocused: false, clicked: false };
  }

  const state = ui.interactionOf(id);
  let clicked = false;

  for (const event of ui.eventsFor(id)) {
    if (event.type === "click") {
      clicked = true;
    } else if (
      event.type === "key" &&
      event.phase === "down" &&
      !event.repeat &&
      ACTIVATION_KEYS.has(event.key)
    ) {
      clicked = true;
    }
  }

  return {
    isHovered: state.hovered,
    isPressed: state.active,
    isFocused: state.focused,
    clicked,
  };
}
