/**
 * Interaction Types
 */

import type { Point, Rect } from "../math/rect";
import type { WidgetId } from "../ui/IdStack";
import type { DragData } from "./dragDrop";
import type { Modifiers, PointerKey } from "./InputEvent";
import type { ShortcutId } from "./shortcuts";

/** Per-widget interaction flags */
export interface InteractionState {
  /** Pointer is over the widget */
  hovered: boolean;
  /** Pressed and tracking a pointer */
  active: boolean;
  /** Holds keyboard focus */
  focused: boolean;
}

export const IDLE_STATE: Readonly<InteractionState> = Object.freeze({
  hovered: false,
  active: false,
  focused: false,
});

/** Widget geometry registered by the UI context, in paint order */
export interface HitTarget {
  id: WidgetId;
  bounds: Rect;
  focusable: boolean;
  /** Wheel input over this target or a descendant goes here */
  scrollable?: boolean;
  /** Nearest enclosing interactive container */
  parent?: WidgetId;
}

export interface HitResult {
  id: WidgetId;
  bounds: Rect;
  /** Position relative to the widget's top-left corner */
  local: Point;
}

/**
 * Messages produced by the interaction system. Widgets read them during
 * the next declarative pass instead of mutating captured state from
 * callbacks.
 */
export type InteractionEvent =
  | { type: "enter"; id: WidgetId }
  | { type: "leave"; id: WidgetId }
  | { type: "down"; id: WidgetId; pointer: PointerKey; position: Point; local: Point }
  | { type: "up"; id: WidgetId; pointer: PointerKey; position: Point }
  | { type: "click"; id: WidgetId; pointer: PointerKey; position: Point; local: Point }
  | { type: "cancel"; id: WidgetId; pointer: PointerKey }
  | { type: "focus"; id: WidgetId }
  | { type: "blur"; id: WidgetId }
  | {
      type: "key";
      id: WidgetId;
      phase: "down" | "up";
      key: string;
      modifiers: Modifiers;
      repeat: boolean;
    }
  | { type: "text"; id: WidgetId; text: string }
  | { type: "wheel"; id: WidgetId; position: Point; delta: Point }
  /** Global and context shortcuts carry a null id */
  | { type: "shortcut"; id: WidgetId | null; shortcut: ShortcutId; action: string }
  // Drag events go to the source; zone events carry the source separately
  | { type: "dragStart"; id: WidgetId; position: Point; data: DragData }
  | { type: "dragMove"; id: WidgetId; position: Point; delta: Point }
  | { type: "dragCancel"; id: WidgetId }
  | { type: "dragEnter"; id: WidgetId; source: WidgetId; data: DragData }
  | { type: "dragOver"; id: WidgetId; source: WidgetId; position: Point; local: Point }
  | { type: "dragLeave"; id: WidgetId; source: WidgetId }
  | {
      type: "drop";
      id: WidgetId;
      source: WidgetId;
      data: DragData;
      position: Point;
      local: Point;
      insertIndex?: number;
    };

export type InteractionEventType = InteractionEvent["type"];
