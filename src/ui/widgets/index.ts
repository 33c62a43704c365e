/**
 * UI Widgets
 *
 * Immediate mode widgets for the UI system.
 */

export { pressable, type PressableState, type PressableOptions } from "./interaction";
export { button, type ButtonOptions, type ButtonResult } from "./Button";
export { toggle, type ToggleOptions, type ToggleResult } from "./ToggleButton";
export {
  textInput,
  createTextFieldState,
  type TextFieldState,
  type TextInputOptions,
  type TextInputResult,
} from "./TextInput";
export {
  scrollArea,
  createScrollState,
  type ScrollState,
  type ScrollAreaOptions,
  type ScrollAreaResult,
} from "./ScrollArea";
