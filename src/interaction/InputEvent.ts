/**
 * Input Events
 *
 * Raw platform events and their canonical form. Mouse and touch events are
 * mapped onto one pointer abstraction keyed by button or touch id, so a
 * single state machine handles both input families.
 */

import type { Point } from "../math/rect";

export type MouseButton = "left" | "right" | "middle";

export interface Modifiers {
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}

export const NO_MODIFIERS: Readonly<Modifiers> = Object.freeze({
  shift: false,
  ctrl: false,
  alt: false,
  meta: false,
});

export type InputEvent =
  | { type: "pointerDown"; position: Point; button: MouseButton }
  | { type: "pointerUp"; position: Point; button: MouseButton }
  | { type: "pointerMove"; position: Point }
  | { type: "pointerLeave" }
  | { type: "touchDown"; position: Point; touchId: number }
  | { type: "touchMove"; position: Point; touchId: number }
  | { type: "touchUp"; position: Point; touchId: number }
  | { type: "touchCancel"; touchId: number }
  | { type: "wheel"; position: Point; delta: Point }
  | { type: "keyDown"; key: string; modifiers?: Modifiers; repeat?: boolean }
  | { type: "keyUp"; key: string; modifiers?: Modifiers }
  | { type: "textInput"; text: string };

export type InputEventType = InputEvent["type"];

/** Identifies one pressing device: a mouse button or a touch contact */
export type PointerKey = `mouse:${MouseButton}` | `touch:${number}`;

export type PointerPhase = "down" | "move" | "up" | "cancel" | "leave";

export interface PointerInput {
  kind: "pointer";
  phase: PointerPhase;
  source: "mouse" | "touch";
  /** Null for moves and leaves of the mouse, which track no press */
  pointer: PointerKey | null;
  /** Null when the platform reports no position (cancel, leave) */
  position: Point | null;
  /** Left mouse button or any touch contact */
  primary: boolean;
}

export interface WheelInput {
  kind: "wheel";
  position: Point;
  delta: Point;
}

export interface KeyInput {
  kind: "key";
  phase: "down" | "up";
  key: string;
  modifiers: Modifiers;
  repeat: boolean;
}

export interface TextInput {
  kind: "text";
  text: string;
}

export type CanonicalInput = PointerInput | WheelInput | KeyInput | TextInput;

export function mousePointer(button: MouseButton): PointerKey {
  return `mouse:${button}`;
}

export function touchPointer(touchId: number): PointerKey {
  return `touch:${touchId}`;
}

/**
 * Map a platform event onto the canonical input consumed by the
 * interaction system. TouchCancel becomes a "cancel" phase.
 */
export function canonicalizeInput(event: InputEvent): CanonicalInput {
  switch (event.type) {
    case "pointerDown":
    case "pointerUp":
      return {
        kind: "pointer",
        phase: event.type === "pointerDown" ? "down" : "up",
        source: "mouse",
        pointer: mousePointer(event.button),
        position: event.position,
        primary: event.button === "left",
      };
    case "pointerMove":
      return {
        kind: "pointer",
        phase: "move",
        source: "mouse",
        pointer: null,
        position: event.position,
        primary: true,
      };
    case "pointerLeave":
      return {
        kind: "pointer",
        phase: "leave",
        source: "mouse",
        pointer: null,
        position: null,
        primary: true,
      };
    case "touchDown":
    case "touchMove":
    case "touchUp":
      return {
        kind: "pointer",
        phase: event.type === "touchDown" ? "down" : event.type === "touchUp" ? "up" : "move",
        source: "touch",
        pointer: touchPointer(event.touchId),
        position: event.position,
        primary: true,
      };
    case "touchCancel":
      return {
        kind: "pointer",
        phase: "cancel",
        source: "touch",
        pointer: touchPointer(event.touchId),
        position: null,
        primary: true,
      };
    case "wheel":
      return { kind: "wheel", position: event.position, delta: event.delta };
    case "keyDown":
      return {
        kind: "key",
        phase: "down",
        key: event.key,
        modifiers: event.modifiers ?? NO_MODIFIERS,
        repeat: event.repeat ?? false,
      };
    case "keyUp":
      return {
        kind: "key",
        phase: "up",
        key: event.key,
        modifiers: event.modifiers ?? NO_MODIFIERS,
        repeat: false,
      };
    case "textInput":
      return { kind: "text", text: event.text };
  }
}

/** Position carried by an event, if any */
export function eventPosition(event: InputEvent): Point | null {
  switch (event.type) {
    case "pointerDown":
    case "pointerUp":
    case "pointerMove":
    case "touchDown":
    case "touchMove":
    case "touchUp":
    case "wheel":
      return event.position;
    default:
      return null;
  }
}
