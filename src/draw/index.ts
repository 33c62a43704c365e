export { DrawList, type DrawListPos } from "./DrawList";
export type {
  DrawCommand,
  DrawCommandKind,
  DrawEntry,
  RectCommand,
  FrameCommand,
  TextCommand,
  PushClipCommand,
  PopClipCommand,
  TextStyle,
  TextAlign,
  FrameStyle,
} from "./types";
