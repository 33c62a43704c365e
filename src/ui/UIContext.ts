/**
 * UI Context
 *
 * Drives one declarative pass for one UI layer per frame. Every call
 * derives a WidgetId from the identity stack, reads interaction state
 * produced by earlier input, asks the layout solver for a box and appends
 * draw commands in paint order.
 */

import { DrawList } from "../draw/DrawList";
import type { DrawCommand, TextAlign } from "../draw/types";
import { getEntityStore } from "../entity/context";
import type { EntityStore } from "../entity/EntityStore";
import type { CreateEntityOptions, EntityHandle } from "../entity/types";
import { EngineError } from "../errors";
import type { DragData, DragState, DropZone } from "../interaction/dragDrop";
import { InteractionSystem } from "../interaction/InteractionSystem";
import type { HitTarget, InteractionEvent, InteractionState } from "../interaction/types";
import { intersectRects, rectFromPosSize, rectsEqual, type Point, type Rect, type Size } from "../math/rect";
import type { Color } from "../types/color";
import { isVisibleColor } from "../types/color";
import { IdStack, type IdKey, type WidgetId } from "./IdStack";
import { StackLayout, type LayoutDirection, type LayoutSolver } from "./LayoutSolver";
import { approximateTextMeasurer, type TextMeasurer } from "./TextMeasurer";
import { DEFAULT_THEME, mergeTheme, type ThemeOverrides, type UITheme } from "./UITheme";
import { button, type ButtonOptions, type ButtonResult } from "./widgets/Button";
import { scrollArea, type ScrollAreaOptions, type ScrollAreaResult, type ScrollState } from "./widgets/ScrollArea";
import { textInput, type TextFieldState, type TextInputOptions, type TextInputResult } from "./widgets/TextInput";
import { toggle, type ToggleOptions, type ToggleResult } from "./widgets/ToggleButton";

export interface UIContextOptions {
  interaction?: InteractionSystem;
  entities?: EntityStore;
  layout?: LayoutSolver;
  measurer?: TextMeasurer;
  theme?: ThemeOverrides;
}

/** Frame context passed to beginFrame */
export interface UIFrameContext {
  size: Size;
  scaleFactor?: number;
}

/** Output of one declarative pass */
export interface UIFrame {
  drawList: DrawList<DrawCommand>;
  /** Every WidgetId declared this frame */
  observed: ReadonlySet<WidgetId>;
  /** Hit-testable geometry in paint order */
  targets: readonly HitTarget[];
  /** Hover moved because widgets moved under a still mouse */
  hoverChanged: boolean;
}

export interface TextOptions {
  key?: IdKey;
  color?: Color;
  fontSize?: number;
  align?: TextAlign;
}

export interface RectangleOptions {
  key?: IdKey;
  cornerRadius?: number;
}

export interface ContainerOptions {
  key?: IdKey;
  direction?: LayoutDirection;
  padding?: number;
  spacing?: number;
  width?: number;
  height?: number;
  background?: Color;
  borderColor?: Color;
  borderWidth?: number;
  cornerRadius?: number;
  /** Clip children to the container's bounds */
  clip?: boolean;
  /** Shift children back by this amount (scrolling) */
  scrollOffset?: Point;
  /** Register the container itself as a hit target beneath its children */
  interactive?: boolean;
  /** Wheel input prefers this container over non-scrollable children */
  scrollable?: boolean;
}

export interface ContainerResult {
  id: WidgetId;
  bounds: Rect;
  /** Children's extent including padding, before clipping */
  contentSize: Size;
}

export interface PanelOptions {
  key?: IdKey;
  direction?: LayoutDirection;
  width?: number;
  height?: number;
}

export interface DropZoneOptions {
  /** Accepted drag data types; omitted or empty accepts everything */
  accepts?: readonly string[];
  insertIndex?: number;
}

export interface TargetFlags {
  focusable?: boolean;
  scrollable?: boolean;
}

/**
 * Immediate mode UI context.
 *
 * Widgets are re-declared every frame; state that must outlive a frame
 * lives in the interaction system (per WidgetId) or in the entity store.
 */
export class UIContext {
  readonly interaction: InteractionSystem;
  readonly entities: EntityStore;
  readonly layout: LayoutSolver;
  readonly measurer: TextMeasurer;

  private theme: UITheme;
  private ids = new IdStack();

  // Frame state
  private inFrame: boolean = false;
  private frameSize: Size = { width: 0, height: 0 };
  private frameScale: number = 1;
  private drawList = new DrawList<DrawCommand>();
  private observed = new Set<WidgetId>();
  private targets: HitTarget[] = [];
  /** Interactive containers enclosing the current declaration */
  private parents: WidgetId[] = [];
  private dragSources = new Map<WidgetId, DragData>();
  private dropZones: DropZone[] = [];
  private lastWidgetId: WidgetId | null = null;

  // Entities kept alive on behalf of keyed call sites
  private retained = new Map<WidgetId, EntityHandle<unknown>>();
  private retainedSeen = new Set<WidgetId>();

  constructor(options: UIContextOptions = {}) {
    this.interaction = options.interaction ?? new InteractionSystem();
    this.entities = options.entities ?? getEntityStore();
    this.layout = options.layout ?? new StackLayout();
    this.measurer = options.measurer ?? approximateTextMeasurer;
    this.theme = options.theme ? mergeTheme(options.theme) : DEFAULT_THEME;
  }

  // ==================== Frame Lifecycle ====================

  /**
   * Begin a new UI frame.
   * Must be called before any declarative call.
   */
  beginFrame(frame: UIFrameContext): void {
    if (this.inFrame) {
      throw new EngineError("frame-state", "Already in UI frame - call endFrame() first");
    }

    this.inFrame = true;
    this.frameSize = { ...frame.size };
    this.frameScale = frame.scaleFactor ?? 1;
    this.drawList = new DrawList<DrawCommand>();
    this.observed = new Set();
    this.targets = [];
    this.parents = [];
    this.dragSources = new Map();
    this.dropZones = [];
    this.lastWidgetId = null;
    this.retainedSeen = new Set();

    this.ids.reset();
    this.layout.beginFrame(this.frameSize);
    this.interaction.beginPass();
  }

  /**
   * End the UI frame. Fails if identity scopes are still open.
   */
  endFrame(): UIFrame {
    if (!this.inFrame) {
      throw new EngineError("frame-state", "Not in UI frame - call beginFrame() first");
    }
    this.inFrame = false;
    this.ids.assertBalanced();

    for (const [id, handle] of this.retained) {
      if (!this.retainedSeen.has(id)) {
        this.retained.delete(id);
        this.entities.dropHandle(handle);
      }
    }

    this.interaction.dragDrop.commit(this.dragSources, this.dropZones);
    const hoverEvents = this.interaction.commitFrame(this.targets, this.observed);

    return {
      drawList: this.drawList,
      observed: this.observed,
      targets: this.targets,
      hoverChanged: hoverEvents.length > 0,
    };
  }

  /**
   * Abandon a frame whose declarative pass threw. Nothing is committed:
   * interaction state and retained entities stay as the last frame left them.
   */
  abortFrame(): void {
    this.inFrame = false;
    this.ids.reset();
  }

  get isInFrame(): boolean {
    return this.inFrame;
  }

  /** Release every retained entity and forget interaction state */
  dispose(): void {
    this.abortFrame();
    for (const handle of this.retained.values()) {
      this.entities.dropHandle(handle);
    }
    this.retained.clear();
    this.interaction.reset();
  }

  // ==================== Identity ====================

  /**
   * Allocate and record the id of the next widget.
   */
  widgetId(key?: IdKey): WidgetId {
    this.assertInFrame();
    const id = this.ids.currentId(key);
    this.observe(id);
    return id;
  }

  /**
   * The id the next widget declared with this key would get.
   */
  peekId(key?: IdKey): WidgetId {
    return this.ids.peekId(key);
  }

  /** Open a user identity scope */
  pushId(key: IdKey): WidgetId {
    this.assertInFrame();
    return this.ids.pushScope(key);
  }

  popId(): void {
    this.ids.popScope();
  }

  withId<R>(key: IdKey, body: () => R): R {
    this.pushId(key);
    const result = body();
    this.popId();
    return result;
  }

  /** Id of the most recently declared widget */
  get lastId(): WidgetId | null {
    return this.lastWidgetId;
  }

  private observe(id: WidgetId): void {
    this.observed.add(id);
    this.lastWidgetId = id;
  }

  // ==================== Interaction ====================

  interactionOf(id: WidgetId): Readonly<InteractionState> {
    return this.interaction.stateOf(id);
  }

  /** Events delivered to a widget since the previous pass */
  eventsFor(id: WidgetId): InteractionEvent[] {
    return this.interaction.eventsFor(id);
  }

  requestFocus(id: WidgetId): void {
    this.interaction.focus(id);
  }

  /**
   * Register hit-testable geometry for a widget. Enclosing clipping
   * containers trim it when they close; fully clipped widgets are dropped.
   */
  addTarget(id: WidgetId, bounds: Rect, flags: TargetFlags = {}): void {
    this.assertInFrame();
    this.targets.push(this.withParent({
      id,
      bounds,
      focusable: flags.focusable ?? false,
      scrollable: flags.scrollable ?? false,
    }));
  }

  /** Check if a shortcut for the action fired since the previous pass */
  shortcutTriggered(action: string): boolean {
    return this.interaction.wasShortcutTriggered(action);
  }

  // ==================== Drag and Drop ====================

  /**
   * Let a pressable widget be dragged, carrying `data`. Must be declared
   * every frame the widget stays draggable.
   */
  dragSource(id: WidgetId, data: DragData): void {
    this.assertInFrame();
    this.dragSources.set(id, data);
  }

  /**
   * Accept drops inside `bounds`. Enclosing clipping containers trim the
   * zone the same way they trim hit targets.
   */
  dropZone(id: WidgetId, bounds: Rect, options: DropZoneOptions = {}): void {
    this.assertInFrame();
    this.dropZones.push({ id, bounds, accepts: options.accepts ?? [], insertIndex: options.insertIndex });
  }

  /** The drag in progress, for drawing a preview */
  get drag(): Readonly<DragState> | null {
    return this.interaction.dragDrop.current();
  }

  // ==================== Entities ====================

  /**
   * Entity kept alive for as long as this keyed call site keeps being
   * declared. The handle belongs to the context; do not drop it.
   */
  useEntity<T>(key: IdKey, init: () => T, options?: CreateEntityOptions<T>): EntityHandle<T> {
    this.assertInFrame();
    const id = this.ids.currentId(key);
    this.retainedSeen.add(id);

    const existing = this.retained.get(id);
    if (existing && this.entities.isAlive(existing)) {
      return existing as EntityHandle<T>;
    }
    const handle = this.entities.create(init, options);
    this.retained.set(id, handle);
    return handle;
  }

  // ==================== Layout & Drawing ====================

  /**
   * Place a fixed-size leaf for a widget.
   */
  allocate(id: WidgetId, size: Size): Rect {
    this.assertInFrame();
    return this.layout.leaf(id, size);
  }

  /**
   * Append a draw command. Returns its position in the draw list.
   */
  draw(command: DrawCommand): number {
    this.assertInFrame();
    return this.drawList.append(command);
  }

  measureText(text: string, fontSize: number): Size {
    return this.measurer.measure(text, fontSize);
  }

  // ==================== Basic Widgets ====================

  /**
   * Render a text label.
   */
  text(content: string, options: TextOptions = {}): Rect {
    const theme = this.theme.label;
    const fontSize = options.fontSize ?? theme.fontSize;
    const size = this.measureText(content, fontSize);
    const id = this.widgetId(options.key);
    const rect = this.allocate(id, size);

    this.draw({
      kind: "text",
      position: { x: rect.x, y: rect.y },
      text: content,
      size,
      style: { color: options.color ?? theme.color, fontSize, align: options.align ?? "left" },
    });
    return rect;
  }

  /**
   * Render a filled rectangle.
   */
  rectangle(size: Size, color: Color, options: RectangleOptions = {}): Rect {
    const id = this.widgetId(options.key);
    const rect = this.allocate(id, size);
    if (isVisibleColor(color)) {
      this.draw({ kind: "rect", rect, color, cornerRadius: options.cornerRadius ?? 0 });
    }
    return rect;
  }

  /** Empty space */
  spacer(size: Size, key?: IdKey): Rect {
    const id = this.widgetId(key);
    return this.allocate(id, size);
  }

  /**
   * Group children in a box. The background is inserted before the
   * children once the box size is known.
   */
  container(options: ContainerOptions, body: () => void): ContainerResult {
    this.assertInFrame();
    const id = this.ids.pushScope(options.key);
    this.observe(id);

    this.layout.openBox(id, {
      direction: options.direction ?? "vertical",
      padding: options.padding ?? 0,
      spacing: options.spacing ?? this.theme.panel.spacing,
      width: options.width,
      height: options.height,
      scrollOffset: options.scrollOffset,
    });

    const drawStart = this.drawList.position();
    const targetStart = this.targets.length;
    const zoneStart = this.dropZones.length;

    if (options.interactive) this.parents.push(id);
    body();
    if (options.interactive) this.parents.pop();

    const bounds = this.layout.closeBox(id);
    this.ids.popScope();
    const contentSize = this.layout.contentSizeOf(id) ?? { width: bounds.width, height: bounds.height };

    let insertAt = drawStart;
    if (options.background && isVisibleColor(options.background)) {
      const borderWidth = options.borderWidth ?? 0;
      this.drawList.insertBefore(insertAt, {
        kind: "frame",
        rect: bounds,
        style: {
          fill: options.background,
          borderColor: options.borderColor ?? [0, 0, 0, 0],
          borderWidth,
          cornerRadius: options.cornerRadius ?? 0,
        },
      });
      insertAt++;
    }

    if (options.clip) {
      this.drawList.insertBefore(insertAt, { kind: "pushClip", rect: bounds });
      this.drawList.append({ kind: "popClip" });
      this.clipCommands(insertAt + 1, bounds);
      this.clipTargets(targetStart, bounds);
      this.clipZones(zoneStart, bounds);
    }

    if (options.interactive) {
      this.targets.splice(targetStart, 0, this.withParent({
        id,
        bounds,
        focusable: false,
        scrollable: options.scrollable ?? false,
      }));
    }

    this.lastWidgetId = id;
    return { id, bounds, contentSize };
  }

  horizontal(body: () => void, options: Omit<ContainerOptions, "direction"> = {}): ContainerResult {
    return this.container({ ...options, direction: "horizontal" }, body);
  }

  vertical(body: () => void, options: Omit<ContainerOptions, "direction"> = {}): ContainerResult {
    return this.container({ ...options, direction: "vertical" }, body);
  }

  /**
   * Framed container that clips its children.
   */
  panel(options: PanelOptions, body: () => void): ContainerResult {
    const theme = this.theme.panel;
    return this.container(
      {
        ...options,
        padding: theme.padding,
        spacing: theme.spacing,
        background: theme.background,
        borderColor: theme.borderColor,
        borderWidth: theme.borderWidth,
        cornerRadius: theme.borderRadius,
        clip: true,
        interactive: true,
      },
      body
    );
  }

  // ==================== Interactive Widgets ====================

  button(label: string, options: ButtonOptions = {}): ButtonResult {
    return button(this, label, options);
  }

  toggle(label: string, checked: boolean, options: ToggleOptions = {}): ToggleResult {
    return toggle(this, label, checked, options);
  }

  textInput(state: EntityHandle<TextFieldState>, options: TextInputOptions = {}): TextInputResult {
    return textInput(this, state, options);
  }

  scrollArea(
    state: EntityHandle<ScrollState>,
    options: ScrollAreaOptions,
    body: () => void
  ): ScrollAreaResult {
    return scrollArea(this, state, options, body);
  }

  // ==================== Accessors ====================

  /** Get the current theme */
  getTheme(): UITheme {
    return this.theme;
  }

  /** Surface size of the current frame */
  get size(): Size {
    return this.frameSize;
  }

  get scaleFactor(): number {
    return this.frameScale;
  }

  private withParent(target: HitTarget): HitTarget {
    const parent = this.parents[this.parents.length - 1];
    return parent === undefined ? target : { ...target, parent };
  }

  /** Narrow nested clip rects to the one that encloses them */
  private clipCommands(start: number, clip: Rect): void {
    const entries = this.drawList.entries();
    for (let i = start; i < entries.length; i++) {
      const command = entries[i]?.command;
      if (!command || command.kind !== "pushClip") continue;
      const visible = intersectRects(command.rect, clip) ?? rectFromPosSize(clip, { width: 0, height: 0 });
      if (!rectsEqual(visible, command.rect)) {
        this.drawList.replace(i, { kind: "pushClip", rect: visible });
      }
    }
  }

  private clipTargets(start: number, clip: Rect): void {
    const kept: HitTarget[] = [];
    for (const target of this.targets.slice(start)) {
      const visible = intersectRects(target.bounds, clip);
      if (visible) kept.push({ ...target, bounds: visible });
    }
    this.targets.splice(start, this.targets.length - start, ...kept);
  }

  private clipZones(start: number, clip: Rect): void {
    const kept: DropZone[] = [];
    for (const zone of this.dropZones.slice(start)) {
      const visible = intersectRects(zone.bounds, clip);
      if (visible) kept.push({ ...zone, bounds: visible });
    }
    this.dropZones.splice(start, this.dropZones.length - start, ...kept);
  }

  private assertInFrame(): void {
    if (!this.inFrame) {
      throw new EngineError("frame-state", "Not in UI frame - call beginFrame() first");
    }
  }
}
