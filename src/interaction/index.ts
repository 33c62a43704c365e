export { InteractionSystem } from "./InteractionSystem";
export { hitTest } from "./hitTest";
export {
  ShortcutRegistry,
  GLOBAL_SCOPE,
  shortcut,
  parseShortcut,
  normalizeKey,
  shortcutMatches,
  formatShortcut,
  type Shortcut,
  type ShortcutId,
  type ShortcutScope,
  type ShortcutInfo,
  type ShortcutMatch,
  type ShortcutConflict,
  type RegisterShortcutOptions,
} from "./shortcuts";
export {
  DragDropController,
  DropZoneRegistry,
  DRAG_THRESHOLD,
  dragString,
  dragIndex,
  dragIndices,
  dragJson,
  zoneAccepts,
  dragDelta,
  previewPosition,
  type DragData,
  type DragPayload,
  type DragState,
  type DropZone,
} from "./dragDrop";
export {
  canonicalizeInput,
  eventPosition,
  mousePointer,
  touchPointer,
  NO_MODIFIERS,
  type CanonicalInput,
  type InputEvent,
  type InputEventType,
  type KeyInput,
  type Modifiers,
  type MouseButton,
  type PointerInput,
  type PointerKey,
  type PointerPhase,
  type TextInput,
  type WheelInput,
} from "./InputEvent";
export {
  IDLE_STATE,
  type HitResult,
  type HitTarget,
  type InteractionEvent,
  type InteractionEventType,
  type InteractionState,
} from "./types";
