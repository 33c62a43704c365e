/**
 * Immediate Mode UI System
 *
 * Declarative widgets re-declared every frame, producing a draw list.
 */

// Core
export {
  UIContext,
  type UIContextOptions,
  type UIFrameContext,
  type UIFrame,
  type TextOptions,
  type RectangleOptions,
  type ContainerOptions,
  type ContainerResult,
  type PanelOptions,
  type TargetFlags,
  type DropZoneOptions,
} from "./UIContext";
export { IdStack, hashWidgetId, stableId, ROOT_ID, type WidgetId, type IdKey } from "./IdStack";
export {
  StackLayout,
  DEFAULT_STACK_LAYOUT_OPTIONS,
  type LayoutSolver,
  type LayoutDirection,
  type BoxStyle,
  type StackLayoutOptions,
} from "./LayoutSolver";
export {
  approximateTextMeasurer,
  CHAR_WIDTH_RATIO,
  LINE_HEIGHT_RATIO,
  type TextMeasurer,
} from "./TextMeasurer";

// Theme
export {
  type UITheme,
  type ThemeOverrides,
  type ButtonTheme,
  type PanelTheme,
  type LabelTheme,
  type ToggleTheme,
  type TextInputTheme,
  type ScrollbarTheme,
  DEFAULT_THEME,
  mergeTheme,
} from "./UITheme";

// Widgets
export * from "./widgets";
