/**
 * Interaction System
 *
 * Tracks hovered, active (pressed) and focused widgets following the imgui
 * pattern. Geometry comes from the previous frame's hit targets; events
 * produced here are queued and read by widgets during the next pass.
 * Key presses are matched against the shortcut registry before they reach
 * the focused widget; presses on drag sources feed the drag controller.
 */

import type { Point } from "../math/rect";
import type { WidgetId } from "../ui/IdStack";
import { DragDropController } from "./dragDrop";
import { hitTest } from "./hitTest";
import {
  canonicalizeInput,
  type InputEvent,
  type KeyInput,
  type PointerInput,
  type PointerKey,
  type TextInput,
  type WheelInput,
} from "./InputEvent";
import { ShortcutRegistry } from "./shortcuts";
import {
  IDLE_STATE,
  type HitResult,
  type HitTarget,
  type InteractionEvent,
  type InteractionState,
} from "./types";

export class InteractionSystem {
  readonly shortcuts = new ShortcutRegistry();
  readonly dragDrop = new DragDropController();

  /** Hit targets of the last committed frame, in paint order */
  private targets: HitTarget[] = [];
  private targetIds = new Set<WidgetId>();

  /** Per-widget state, created when an id is first observed */
  private states = new Map<WidgetId, InteractionState>();

  private hovered: WidgetId | null = null;
  private focused: WidgetId | null = null;
  /** Which widget each pointer pressed */
  private pressed = new Map<PointerKey, WidgetId>();
  /** Last known mouse position, used to refresh hover after layout changes */
  private mousePosition: Point | null = null;

  private focusTraps: WidgetId[][] = [];

  /** Events visible to the current declarative pass */
  private frameEvents: InteractionEvent[] = [];
  /** Events produced since the pass began */
  private incoming: InteractionEvent[] = [];

  // ==================== Input ====================

  /**
   * Feed one platform event through the state machine.
   * Returns the produced events, which are also queued for the next pass.
   */
  handleInput(event: InputEvent): InteractionEvent[] {
    const input = canonicalizeInput(event);
    const out: InteractionEvent[] = [];

    switch (input.kind) {
      case "pointer":
        this.handlePointer(input, out);
        break;
      case "wheel":
        this.handleWheel(input, out);
        break;
      case "key":
        this.handleKey(input, out);
        break;
      case "text":
        this.handleText(input, out);
        break;
    }

    this.incoming.push(...out);
    return out;
  }

  private handlePointer(input: PointerInput, out: InteractionEvent[]): void {
    if (input.source === "mouse") {
      this.mousePosition = input.position;
    }

    switch (input.phase) {
      case "move":
        if (input.position) {
          this.updateHover(input.position, out);
          this.dragDrop.move(input.pointer, input.position, out);
        }
        break;
      case "leave":
        this.setHovered(null, out);
        break;
      case "down":
        if (input.pointer && input.position) {
          this.handleDown(input.pointer, input.position, input.primary, out);
        }
        break;
      case "up":
        if (input.pointer && input.position) {
          this.handleUp(input.pointer, input.position, input.source, out);
        }
        break;
      case "cancel":
        if (input.pointer) this.handleCancel(input.pointer, out);
        break;
    }
  }

  private handleDown(
    pointer: PointerKey,
    position: Point,
    primary: boolean,
    out: InteractionEvent[]
  ): void {
    // A repeated down without an up supersedes the earlier press
    const previous = this.pressed.get(pointer);
    if (previous !== undefined) {
      this.pressed.delete(pointer);
      this.refreshActive(previous);
    }

    this.updateHover(position, out);
    const hit = this.hitTest(position);

    if (!hit) {
      if (primary) this.blur(out);
      return;
    }

    this.pressed.set(pointer, hit.id);
    this.stateFor(hit.id).active = true;
    out.push({ type: "down", id: hit.id, pointer, position, local: hit.local });
    this.dragDrop.press(pointer, position, hit.id, hit.bounds);

    if (primary) {
      if (this.isFocusable(hit.id)) {
        this.focusInto(hit.id, out);
      } else {
        this.blur(out);
      }
    }
  }

  private handleUp(
    pointer: PointerKey,
    position: Point,
    source: "mouse" | "touch",
    out: InteractionEvent[]
  ): void {
    const id = this.pressed.get(pointer);
    if (id === undefined) return;

    this.pressed.delete(pointer);
    this.refreshActive(id);

    const hit = this.hitTest(position);
    out.push({ type: "up", id, pointer, position });
    const dragged = this.dragDrop.release(pointer, position, out);
    if (!dragged && hit && hit.id === id) {
      out.push({ type: "click", id, pointer, position, local: hit.local });
    }

    // A lifted finger hovers nothing; the mouse keeps hovering where it is
    if (source === "touch") {
      if (this.hovered === id) this.setHovered(null, out);
    } else {
      this.updateHover(position, out);
    }
  }

  private handleCancel(pointer: PointerKey, out: InteractionEvent[]): void {
    const id = this.pressed.get(pointer);
    if (id === undefined) return;

    this.pressed.delete(pointer);
    this.refreshActive(id);
    out.push({ type: "cancel", id, pointer });
    this.dragDrop.cancel(pointer, out);
    if (this.hovered === id) this.setHovered(null, out);
  }

  /**
   * Wheel input goes to the nearest scrollable ancestor of the topmost
   * hit (the hit itself included), or to the hit when it has none.
   */
  private handleWheel(input: WheelInput, out: InteractionEvent[]): void {
    const hit = this.hitTest(input.position);
    if (!hit) return;

    let id = hit.id;
    let target = this.targetById(hit.id);
    for (let depth = 0; target && depth < this.targets.length; depth++) {
      if (target.scrollable === true) {
        id = target.id;
        break;
      }
      target = target.parent === undefined ? undefined : this.targetById(target.parent);
    }
    out.push({ type: "wheel", id, position: input.position, delta: input.delta });
  }

  private handleKey(input: KeyInput, out: InteractionEvent[]): void {
    if (input.phase === "down") {
      if (input.key === "Escape" && this.dragDrop.cancel(null, out)) return;
      if (this.triggerShortcut(input, out)) return;
    }
    if (input.key === "Tab" && input.phase === "down") {
      this.cycleFocus(input.modifiers.shift ? -1 : 1, out);
      return;
    }
    if (this.focused === null) return;
    out.push({
      type: "key",
      id: this.focused,
      phase: input.phase,
      key: input.key,
      modifiers: input.modifiers,
      repeat: input.repeat,
    });
  }

  private triggerShortcut(input: KeyInput, out: InteractionEvent[]): boolean {
    const match = this.shortcuts.findMatch(input.key, input.modifiers, this.focused);
    if (!match) return false;
    const scope = this.shortcuts.get(match.id)?.scope;
    out.push({
      type: "shortcut",
      id: scope?.kind === "focused" ? scope.id : null,
      shortcut: match.id,
      action: match.action,
    });
    return true;
  }

  private handleText(input: TextInput, out: InteractionEvent[]): void {
    if (this.focused === null || input.text.length === 0) return;
    out.push({ type: "text", id: this.focused, text: input.text });
  }

  // ==================== Hover ====================

  private updateHover(position: Point, out: InteractionEvent[]): void {
    const hit = this.hitTest(position);
    let next = hit ? hit.id : null;

    // While something is pressed, only a pressed widget may be hovered
    if (this.pressed.size > 0 && next !== null && !this.isPressed(next)) {
      next = null;
    }
    this.setHovered(next, out);
  }

  private setHovered(id: WidgetId | null, out: InteractionEvent[]): void {
    if (this.hovered === id) return;

    if (this.hovered !== null) {
      const prev = this.states.get(this.hovered);
      if (prev) prev.hovered = false;
      out.push({ type: "leave", id: this.hovered });
    }
    this.hovered = id;
    if (id !== null) {
      this.stateFor(id).hovered = true;
      out.push({ type: "enter", id });
    }
  }

  // ==================== Focus ====================

  /**
   * Give keyboard focus to a widget. Returns the focus/blur events.
   */
  focus(id: WidgetId): InteractionEvent[] {
    const out: InteractionEvent[] = [];
    this.focusInto(id, out);
    this.incoming.push(...out);
    return out;
  }

  /**
   * Clear keyboard focus.
   */
  clearFocus(): InteractionEvent[] {
    const out: InteractionEvent[] = [];
    this.blur(out);
    this.incoming.push(...out);
    return out;
  }

  private focusInto(id: WidgetId, out: InteractionEvent[]): void {
    if (this.focused === id) return;
    this.blur(out);
    this.focused = id;
    this.stateFor(id).focused = true;
    out.push({ type: "focus", id });
  }

  private blur(out: InteractionEvent[]): void {
    if (this.focused === null) return;
    const id = this.focused;
    this.focused = null;
    const state = this.states.get(id);
    if (state) state.focused = false;
    out.push({ type: "blur", id });
  }

  /**
   * Move focus to the next focusable widget in paint order, wrapping.
   */
  focusNext(): InteractionEvent[] {
    const out: InteractionEvent[] = [];
    this.cycleFocus(1, out);
    this.incoming.push(...out);
    return out;
  }

  /**
   * Move focus to the previous focusable widget in paint order, wrapping.
   */
  focusPrevious(): InteractionEvent[] {
    const out: InteractionEvent[] = [];
    this.cycleFocus(-1, out);
    this.incoming.push(...out);
    return out;
  }

  private cycleFocus(step: 1 | -1, out: InteractionEvent[]): void {
    const order = this.focusOrder();
    if (order.length === 0) return;

    const current = this.focused === null ? -1 : order.indexOf(this.focused);
    let index: number;
    if (current === -1) {
      index = step === 1 ? 0 : order.length - 1;
    } else {
      index = (current + step + order.length) % order.length;
    }
    const next = order[index];
    if (next !== undefined) this.focusInto(next, out);
  }

  /**
   * Restrict focus cycling to the given widgets (modal dialogs).
   * Focus moves into the trap if it is currently outside.
   */
  pushFocusTrap(ids: readonly WidgetId[]): InteractionEvent[] {
    const out: InteractionEvent[] = [];
    this.focusTraps.push([...ids]);
    if (ids.length > 0 && (this.focused === null || !ids.includes(this.focused))) {
      const first = ids.find((id) => this.isFocusable(id)) ?? ids[0];
      if (first !== undefined) this.focusInto(first, out);
    }
    this.incoming.push(...out);
    return out;
  }

  /**
   * Remove the innermost focus trap.
   */
  popFocusTrap(): void {
    this.focusTraps.pop();
  }

  get focusTrapDepth(): number {
    return this.focusTraps.length;
  }

  private focusOrder(): WidgetId[] {
    const trap = this.focusTraps[this.focusTraps.length - 1];
    const focusable = this.targets.filter((t) => t.focusable).map((t) => t.id);
    if (!trap) return focusable;
    return focusable.filter((id) => trap.includes(id));
  }

  private targetById(id: WidgetId): HitTarget | undefined {
    return this.targets.find((t) => t.id === id);
  }

  private isFocusable(id: WidgetId): boolean {
    return this.targets.some((t) => t.id === id && t.focusable);
  }

  // ==================== Queries ====================

  /**
   * Topmost target under the point, from the last committed frame.
   */
  hitTest(point: Point): HitResult | null {
    return hitTest(this.targets, point);
  }

  /**
   * Interaction state of a widget. Ids never observed report idle.
   */
  stateOf(id: WidgetId): Readonly<InteractionState> {
    return this.states.get(id) ?? IDLE_STATE;
  }

  isHovered(id: WidgetId): boolean {
    return this.hovered === id;
  }

  isActive(id: WidgetId): boolean {
    return this.isPressed(id);
  }

  isFocused(id: WidgetId): boolean {
    return this.focused === id;
  }

  getHovered(): WidgetId | null {
    return this.hovered;
  }

  getFocused(): WidgetId | null {
    return this.focused;
  }

  /**
   * Check if any widget is currently pressed.
   */
  hasActive(): boolean {
    return this.pressed.size > 0;
  }

  /**
   * Number of widgets with tracked state.
   */
  get trackedCount(): number {
    return this.states.size;
  }

  private isPressed(id: WidgetId): boolean {
    for (const pressedId of this.pressed.values()) {
      if (pressedId === id) return true;
    }
    return false;
  }

  private refreshActive(id: WidgetId): void {
    const state = this.states.get(id);
    if (state) state.active = this.isPressed(id);
  }

  private stateFor(id: WidgetId): InteractionState {
    let state = this.states.get(id);
    if (!state) {
      state = { ...IDLE_STATE };
      this.states.set(id, state);
    }
    return state;
  }

  // ==================== Event queue ====================

  /**
   * Start a declarative pass: events produced since the previous pass
   * become visible through eventsFor() and wasClicked().
   */
  beginPass(): void {
    this.frameEvents = this.incoming;
    this.incoming = [];
  }

  /**
   * Events for one widget visible to the current pass.
   */
  eventsFor(id: WidgetId): InteractionEvent[] {
    return this.frameEvents.filter((e) => e.id === id);
  }

  /**
   * Check if the widget received a click since the previous pass.
   */
  wasClicked(id: WidgetId): boolean {
    return this.frameEvents.some((e) => e.type === "click" && e.id === id);
  }

  /**
   * Check if a shortcut for the action fired since the previous pass.
   */
  wasShortcutTriggered(action: string): boolean {
    return this.frameEvents.some((e) => e.type === "shortcut" && e.action === action);
  }

  /**
   * Take every queued event, both visible and pending.
   */
  drainEvents(): InteractionEvent[] {
    const events = [...this.frameEvents, ...this.incoming];
    this.frameEvents = [];
    this.incoming = [];
    return events;
  }

  // ==================== Frame commit ====================

  /**
   * Install the geometry of a finished frame and forget every widget the
   * frame did not declare: its state, hover, presses and focus are dropped
   * without events.
   *
   * Returns the enter/leave events of widgets that moved under a still
   * mouse; they are queued for the next pass as well.
   */
  commitFrame(targets: readonly HitTarget[], observed: ReadonlySet<WidgetId>): InteractionEvent[] {
    this.targets = [...targets];
    this.targetIds = new Set(targets.map((t) => t.id));

    for (const id of this.states.keys()) {
      if (!observed.has(id)) this.states.delete(id);
    }
    for (const id of observed) {
      this.stateFor(id);
    }

    if (this.hovered !== null && !observed.has(this.hovered)) {
      this.hovered = null;
    }
    if (this.focused !== null && !observed.has(this.focused)) {
      this.focused = null;
    }
    for (const [pointer, id] of this.pressed) {
      if (!observed.has(id)) this.pressed.delete(pointer);
    }
    this.focusTraps = this.focusTraps.map((trap) => trap.filter((id) => observed.has(id)));

    // Flags of surviving widgets follow the tracked ids
    for (const [id, state] of this.states) {
      state.hovered = this.hovered === id;
      state.active = this.isPressed(id);
      state.focused = this.focused === id;
    }

    // Widgets may have moved under a stationary mouse
    const out: InteractionEvent[] = [];
    if (this.mousePosition) {
      this.updateHover(this.mousePosition, out);
      this.incoming.push(...out);
    }
    return out;
  }

  /**
   * Check if a widget has geometry in the last committed frame.
   */
  hasTarget(id: WidgetId): boolean {
    return this.targetIds.has(id);
  }

  /**
   * Drop all state, geometry and queued events. Registered shortcuts stay.
   */
  reset(): void {
    this.targets = [];
    this.targetIds.clear();
    this.states.clear();
    this.hovered = null;
    this.focused = null;
    this.pressed.clear();
    this.mousePosition = null;
    this.focusTraps = [];
    this.frameEvents = [];
    this.incoming = [];
    this.dragDrop.reset();
  }
}
