/**
 * Text Input Widget
 *
 * Single-line text input for the immediate mode UI system. The text and
 * cursor live in an entity so other widgets and layers can read them.
 */

import type { EntityHandle } from "../../entity/types";
import type { Rect } from "../../math/rect";
import type { IdKey, WidgetId } from "../IdStack";
import type { UIContext } from "../UIContext";

/** Persistent text field state */
export interface TextFieldState {
  text: string;
  /** Insertion point, a UTF-16 offset between code points */
  cursor: number;
}

export function createTextFieldState(text: string = ""): TextFieldState {
  return { text, cursor: text.length };
}

/** Text input configuration */
export interface TextInputOptions {
  key?: IdKey;
  placeholder?: string;
  maxLength?: number;
  width?: number;
}

/** Text input result */
export interface TextInputResult {
  id: WidgetId;
  bounds: Rect;
  value: string;
  isFocused: boolean;
  changed: boolean;
  submitted: boolean;
}

/**
 * Render a text input field.
 */
export function textInput(
  ui: UIContext,
  state: EntityHandle<TextFieldState>,
  options: TextInputOptions = {}
): TextInputResult {
  const { key, placeholder, maxLength } = options;
  const theme = ui.getTheme().textInput;

  const lineHeight = ui.measureText("", theme.fontSize).height;
  const id = ui.widgetId(key);
  const rect = ui.allocate(id, {
    width: options.width ?? theme.width,
    height: lineHeight + theme.padding * 2,
  });
  ui.addTarget(id, rect, { focusable: true });

  const current = ui.entities.get(state);
  let text = current.text;
  let cursor = snapToBoundary(text, Math.max(0, Math.min(text.length, current.cursor)));
  let submitted = false;

  for (const event of ui.eventsFor(id)) {
    switch (event.type) {
      case "down": {
        // Place cursor at the nearest character boundary
        const relX = event.local.x - theme.padding;
        cursor = nearestBoundary(ui, text, relX, theme.fontSize);
        break;
      }
      case "text":
        for (const char of event.text) {
          if (maxLength !== undefined && characterCount(text) >= maxLength) break;
          text = text.slice(0, cursor) + char + text.slice(cursor);
          cursor += char.length;
        }
        break;
      case "key":
        if (event.phase !== "down") break;
        switch (event.key) {
          case "Backspace":
            if (cursor > 0) {
              const start = previousBoundary(text, cursor);
              text = text.slice(0, start) + text.slice(cursor);
              cursor = start;
            }
            break;
          case "Delete":
            if (cursor < text.length) {
              text = text.slice(0, cursor) + text.slice(nextBoundary(text, cursor));
            }
            break;
          case "ArrowLeft":
            cursor = previousBoundary(text, cursor);
            break;
          case "ArrowRight":
            cursor = nextBoundary(text, cursor);
            break;
          case "Home":
            cursor = 0;
            break;
          case "End":
            cursor = text.length;
            break;
          case "Enter":
            submitted = true;
            break;
          case "Escape":
            ui.interaction.clearFocus();
            break;
        }
        break;
    }
  }

  const changed = text !== current.text;
  if (changed || cursor !== current.cursor) {
    ui.entities.withMut(state, (field) => {
      field.text = text;
      field.cursor = cursor;
    });
  }

  const isFocused = ui.interactionOf(id).focused;

  ui.draw({
    kind: "frame",
    rect,
    style: {
      fill: isFocused ? theme.focusBackground : theme.background,
      borderColor: isFocused ? theme.focusBorderColor : theme.borderColor,
      borderWidth: 1,
      cornerRadius: theme.borderRadius,
    },
  });

  // Clip text overflow to the field
  ui.draw({ kind: "pushClip", rect });

  const showPlaceholder = text.length === 0 && placeholder !== undefined && !isFocused;
  const shown = showPlaceholder ? placeholder : text;
  ui.draw({
    kind: "text",
    position: { x: rect.x + theme.padding, y: rect.y + theme.padding },
    text: shown,
    size: ui.measureText(shown, theme.fontSize),
    style: {
      color: showPlaceholder ? theme.placeholderColor : theme.textColor,
      fontSize: theme.fontSize,
      align: "left",
    },
  });

  if (isFocused) {
    const cursorX = rect.x + theme.padding + ui.measureText(text.slice(0, cursor), theme.fontSize).width;
    ui.draw({
      kind: "rect",
      rect: { x: cursorX, y: rect.y + theme.padding, width: 1, height: lineHeight },
      color: theme.cursorColor,
      cornerRadius: 0,
    });
  }

  ui.draw({ kind: "popClip" });

  return { id, bounds: rect, value: text, isFocused, changed, submitted };
}

function nearestBoundary(ui: UIContext, text: string, x: number, fontSize: number): number {
  if (x <= 0) return 0;
  let previousIndex = 0;
  let previousWidth = 0;
  while (previousIndex < text.length) {
    const index = nextBoundary(text, previousIndex);
    const width = ui.measureText(text.slice(0, index), fontSize).width;
    if (width >= x) {
      return width - x < x - previousWidth ? index : previousIndex;
    }
    previousIndex = index;
    previousWidth = width;
  }
  return text.length;
}

// ==================== Character Boundaries ====================
// Cursor positions are UTF-16 offsets that never split a surrogate pair.

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

function splitsPair(text: string, index: number): boolean {
  return index > 0 && isHighSurrogate(text.charCodeAt(index - 1)) && isLowSurrogate(text.charCodeAt(index));
}

function snapToBoundary(text: string, index: number): number {
  return splitsPair(text, index) ? index - 1 : index;
}

function previousBoundary(text: string, index: number): number {
  if (index <= 0) return 0;
  return splitsPair(text, index - 1) ? index - 2 : index - 1;
}

function nextBoundary(text: string, index: number): number {
  if (index >= text.length) return text.length;
  return splitsPair(text, index + 1) ? index + 2 : index + 1;
}

/** Length in characters (code points) rather than UTF-16 units */
function characterCount(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i = nextBoundary(text, i)) {
    count++;
  }
  return count;
}
