/**
 * Layout
 *
 * The UI context registers a tree of boxes keyed by WidgetId and reads
 * back a resolved rectangle per id. Any solver (flexbox, grid) can sit
 * behind LayoutSolver; StackLayout is the built-in one, stacking children
 * along one axis the way a simple cursor-based layout does.
 */

import { EngineError } from "../errors";
import type { Point, Rect, Size } from "../math/rect";
import type { WidgetId } from "./IdStack";

export type LayoutDirection = "vertical" | "horizontal";

export interface BoxStyle {
  direction: LayoutDirection;
  padding: number;
  /** Gap between consecutive children */
  spacing: number;
  /** Fixed size; an omitted axis fits the content */
  width?: number;
  height?: number;
  /** Children are shifted back by this amount */
  scrollOffset?: Point;
}

export interface LayoutSolver {
  /** Start a new tree filling the given surface */
  beginFrame(size: Size): void;
  openBox(id: WidgetId, style: BoxStyle): void;
  /** Place a fixed-size leaf in the innermost open box */
  leaf(id: WidgetId, size: Size): Rect;
  /** Close the innermost box and resolve its rectangle */
  closeBox(id: WidgetId): Rect;
  /** Rectangle resolved this frame, or null if the id was not laid out */
  boundsOf(id: WidgetId): Rect | null;
  /** Size of a closed box's children including padding, before clipping */
  contentSizeOf(id: WidgetId): Size | null;
}

export interface StackLayoutOptions {
  /** Padding of the root box */
  margin?: number;
  /** Spacing between the root's children */
  spacing?: number;
  direction?: LayoutDirection;
}

export const DEFAULT_STACK_LAYOUT_OPTIONS: Readonly<Required<StackLayoutOptions>> = Object.freeze({
  margin: 10,
  spacing: 5,
  direction: "vertical",
});

interface OpenBox {
  id: WidgetId | null;
  style: BoxStyle;
  origin: Point;
  /** Extent used along the stacking axis */
  main: number;
  /** Largest child across the stacking axis */
  cross: number;
  count: number;
}

export class StackLayout implements LayoutSolver {
  private readonly options: Readonly<Required<StackLayoutOptions>>;
  private stack: OpenBox[] = [];
  private bounds = new Map<WidgetId, Rect>();
  private content = new Map<WidgetId, Size>();

  constructor(options: StackLayoutOptions = {}) {
    this.options = { ...DEFAULT_STACK_LAYOUT_OPTIONS, ...options };
  }

  beginFrame(size: Size): void {
    this.bounds.clear();
    this.content.clear();
    this.stack = [
      {
        id: null,
        style: {
          direction: this.options.direction,
          padding: this.options.margin,
          spacing: this.options.spacing,
          width: size.width,
          height: size.height,
        },
        origin: { x: 0, y: 0 },
        main: 0,
        cross: 0,
        count: 0,
      },
    ];
  }

  openBox(id: WidgetId, style: BoxStyle): void {
    const parent = this.top();
    this.stack.push({
      id,
      style,
      origin: this.nextPosition(parent),
      main: 0,
      cross: 0,
      count: 0,
    });
  }

  leaf(id: WidgetId, size: Size): Rect {
    const parent = this.top();
    const position = this.nextPosition(parent);
    this.advance(parent, size);
    const rect = { x: position.x, y: position.y, width: size.width, height: size.height };
    this.bounds.set(id, rect);
    return rect;
  }

  closeBox(id: WidgetId): Rect {
    const box = this.top();
    if (box.id !== id) {
      throw new EngineError("unbalanced-scope", `closeBox(${id}) does not match the innermost open box`);
    }
    this.stack.pop();

    const content = this.contentSize(box);
    const size = {
      width: box.style.width ?? content.width,
      height: box.style.height ?? content.height,
    };
    this.advance(this.top(), size);

    const rect = { x: box.origin.x, y: box.origin.y, width: size.width, height: size.height };
    this.bounds.set(id, rect);
    this.content.set(id, content);
    return rect;
  }

  boundsOf(id: WidgetId): Rect | null {
    return this.bounds.get(id) ?? null;
  }

  contentSizeOf(id: WidgetId): Size | null {
    return this.content.get(id) ?? null;
  }

  /** Open boxes, excluding the root */
  get depth(): number {
    return Math.max(0, this.stack.length - 1);
  }

  private top(): OpenBox {
    const box = this.stack[this.stack.length - 1];
    if (!box) {
      throw new EngineError("frame-state", "layout used outside of a frame");
    }
    return box;
  }

  private nextPosition(box: OpenBox): Point {
    const { padding, spacing, direction, scrollOffset } = box.style;
    const offset = box.count > 0 ? box.main + spacing : 0;
    const x = box.origin.x + padding - (scrollOffset?.x ?? 0);
    const y = box.origin.y + padding - (scrollOffset?.y ?? 0);
    return direction === "vertical" ? { x, y: y + offset } : { x: x + offset, y };
  }

  private advance(box: OpenBox, size: Size): void {
    const vertical = box.style.direction === "vertical";
    const gap = box.count > 0 ? box.style.spacing : 0;
    box.main += gap + (vertical ? size.height : size.width);
    box.cross = Math.max(box.cross, vertical ? size.width : size.height);
    box.count++;
  }

  private contentSize(box: OpenBox): Size {
    const pad = box.style.padding * 2;
    return box.style.direction === "vertical"
      ? { width: box.cross + pad, height: box.main + pad }
      : { width: box.main + pad, height: box.cross + pad };
  }
}
