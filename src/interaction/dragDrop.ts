/**
 * Drag and Drop
 *
 * Widgets offer drag data by registering as drag sources; drop zones are
 * rectangles that accept some data types. Both are registered during a
 * pass and used for the input that arrives before the next one.
 *
 * A press on a source becomes a drag once the pointer travels
 * DRAG_THRESHOLD pixels. Releasing over an accepting zone drops; releasing
 * elsewhere, touch cancel or Escape cancels. A drag never produces a click.
 */

import { containsPoint, type Point, type Rect } from "../math/rect";
import type { WidgetId } from "../ui/IdStack";
import type { PointerKey } from "./InputEvent";
import type { InteractionEvent } from "./types";

/** Pointer travel in pixels before a press on a source becomes a drag */
export const DRAG_THRESHOLD = 5;

export type DragPayload =
  | { kind: "string"; value: string }
  | { kind: "index"; index: number }
  | { kind: "indices"; indices: readonly number[] }
  | { kind: "json"; json: string };

/** What a drag carries; zones filter on `type` */
export interface DragData {
  type: string;
  payload: DragPayload;
}

export function dragString(type: string, value: string): DragData {
  return { type, payload: { kind: "string", value } };
}

/** Index payload, for reordering lists */
export function dragIndex(type: string, index: number): DragData {
  return { type, payload: { kind: "index", index } };
}

export function dragIndices(type: string, indices: readonly number[]): DragData {
  return { type, payload: { kind: "indices", indices: [...indices] } };
}

export function dragJson(type: string, value: unknown): DragData {
  return { type, payload: { kind: "json", json: JSON.stringify(value) } };
}

export interface DropZone {
  id: WidgetId;
  bounds: Rect;
  /** Accepted data types; empty accepts everything */
  accepts: readonly string[];
  /** Position a drop here inserts at, for list reordering */
  insertIndex?: number;
}

export function zoneAccepts(zone: DropZone, type: string): boolean {
  return zone.accepts.length === 0 || zone.accepts.includes(type);
}

/** Drop zones of one frame; later registrations sit on top */
export class DropZoneRegistry {
  private list: DropZone[] = [];

  register(zone: DropZone): void {
    this.list.push(zone);
  }

  clear(): void {
    this.list = [];
  }

  /** Topmost zone under the point that accepts the type */
  findAt(point: Point, type: string): DropZone | null {
    for (let i = this.list.length - 1; i >= 0; i--) {
      const zone = this.list[i];
      if (zone && containsPoint(zone.bounds, point) && zoneAccepts(zone, type)) return zone;
    }
    return null;
  }

  zones(): readonly DropZone[] {
    return this.list;
  }
}

export interface DragState {
  source: WidgetId;
  pointer: PointerKey;
  startPosition: Point;
  position: Point;
  /** Pointer position relative to the source's top-left at drag start */
  offset: Point;
  sourceBounds: Rect;
  data: DragData;
  /** Accepting zone currently under the pointer */
  overZone: WidgetId | null;
}

export function dragDelta(state: DragState): Point {
  return { x: state.position.x - state.startPosition.x, y: state.position.y - state.startPosition.y };
}

/** Where a preview of the source should be drawn */
export function previewPosition(state: DragState): Point {
  return { x: state.position.x - state.offset.x, y: state.position.y - state.offset.y };
}

interface PendingPress {
  source: WidgetId;
  pointer: PointerKey;
  start: Point;
  bounds: Rect;
  data: DragData;
}

function isMousePointer(pointer: PointerKey): boolean {
  return pointer.startsWith("mouse:");
}

/**
 * Drag state machine driven by the interaction system.
 */
export class DragDropController {
  private sources = new Map<WidgetId, DragData>();
  private readonly registry = new DropZoneRegistry();
  private pending: PendingPress | null = null;
  private drag: DragState | null = null;
  /** Pointer of a drag cancelled by Escape; its release must not click */
  private cancelledPointer: PointerKey | null = null;

  /**
   * Install the sources and zones declared by a finished frame. A drag whose
   * source was not declared again ends without events.
   */
  commit(sources: ReadonlyMap<WidgetId, DragData>, zones: readonly DropZone[]): void {
    this.sources = new Map(sources);
    this.registry.clear();
    for (const zone of zones) {
      this.registry.register(zone);
    }

    const tracked = this.drag?.source ?? this.pending?.source;
    if (tracked !== undefined && !this.sources.has(tracked)) {
      this.pending = null;
      this.drag = null;
    }
    const drag = this.drag;
    if (drag && drag.overZone !== null && !this.registry.zones().some((z) => z.id === drag.overZone)) {
      drag.overZone = null;
    }
  }

  isSource(id: WidgetId): boolean {
    return this.sources.has(id);
  }

  /** A press landed on a widget; arm a drag if it is a source */
  press(pointer: PointerKey, position: Point, id: WidgetId, bounds: Rect): void {
    if (this.cancelledPointer === pointer) this.cancelledPointer = null;
    if (this.drag) return;
    const data = this.sources.get(id);
    this.pending = data ? { source: id, pointer, start: position, bounds, data } : null;
  }

  /**
   * Pointer moved. Mouse moves carry no pointer key and apply to a drag
   * started by any mouse button.
   */
  move(pointer: PointerKey | null, position: Point, out: InteractionEvent[]): void {
    if (this.drag) {
      if (!this.owns(this.drag.pointer, pointer)) return;
      this.drag.position = position;
      out.push({ type: "dragMove", id: this.drag.source, position, delta: dragDelta(this.drag) });
      this.updateZone(out);
      return;
    }

    const pending = this.pending;
    if (!pending || !this.owns(pending.pointer, pointer)) return;
    const dx = position.x - pending.start.x;
    const dy = position.y - pending.start.y;
    if (Math.hypot(dx, dy) < DRAG_THRESHOLD) return;

    this.pending = null;
    this.drag = {
      source: pending.source,
      pointer: pending.pointer,
      startPosition: pending.start,
      position,
      offset: { x: pending.start.x - pending.bounds.x, y: pending.start.y - pending.bounds.y },
      sourceBounds: pending.bounds,
      data: pending.data,
      overZone: null,
    };
    out.push({ type: "dragStart", id: pending.source, position: pending.start, data: pending.data });
    out.push({ type: "dragMove", id: pending.source, position, delta: dragDelta(this.drag) });
    this.updateZone(out);
  }

  /**
   * Pointer released. Returns true when it ended a drag, in which case the
   * release must not click.
   */
  release(pointer: PointerKey, position: Point, out: InteractionEvent[]): boolean {
    if (this.pending?.pointer === pointer) this.pending = null;
    if (this.cancelledPointer === pointer) {
      this.cancelledPointer = null;
      return true;
    }

    const drag = this.drag;
    if (!drag || drag.pointer !== pointer) return false;
    this.drag = null;
    drag.position = position;

    const zone = this.registry.findAt(position, drag.data.type);
    if (!zone) {
      if (drag.overZone !== null) out.push({ type: "dragLeave", id: drag.overZone, source: drag.source });
      out.push({ type: "dragCancel", id: drag.source });
      return true;
    }

    if (drag.overZone !== null && drag.overZone !== zone.id) {
      out.push({ type: "dragLeave", id: drag.overZone, source: drag.source });
    }
    out.push({
      type: "drop",
      id: zone.id,
      source: drag.source,
      data: drag.data,
      position,
      local: { x: position.x - zone.bounds.x, y: position.y - zone.bounds.y },
      insertIndex: zone.insertIndex,
    });
    return true;
  }

  /** End the drag of a pointer, or any drag when pointer is null (Escape) */
  cancel(pointer: PointerKey | null, out: InteractionEvent[]): boolean {
    if (pointer === null || this.pending?.pointer === pointer) this.pending = null;

    const drag = this.drag;
    if (!drag || (pointer !== null && drag.pointer !== pointer)) return false;
    this.drag = null;
    if (pointer === null) this.cancelledPointer = drag.pointer;
    if (drag.overZone !== null) out.push({ type: "dragLeave", id: drag.overZone, source: drag.source });
    out.push({ type: "dragCancel", id: drag.source });
    return true;
  }

  /** The drag in progress, if any */
  current(): Readonly<DragState> | null {
    return this.drag;
  }

  get isDragging(): boolean {
    return this.drag !== null;
  }

  zones(): readonly DropZone[] {
    return this.registry.zones();
  }

  reset(): void {
    this.sources.clear();
    this.registry.clear();
    this.pending = null;
    this.drag = null;
    this.cancelledPointer = null;
  }

  private owns(tracked: PointerKey, pointer: PointerKey | null): boolean {
    return pointer === null ? isMousePointer(tracked) : pointer === tracked;
  }

  private updateZone(out: InteractionEvent[]): void {
    const drag = this.drag;
    if (!drag) return;

    const zone = this.registry.findAt(drag.position, drag.data.type);
    const next = zone ? zone.id : null;
    if (next !== drag.overZone) {
      if (drag.overZone !== null) out.push({ type: "dragLeave", id: drag.overZone, source: drag.source });
      drag.overZone = next;
      if (zone) out.push({ type: "dragEnter", id: zone.id, source: drag.source, data: drag.data });
    }
    if (zone) {
      out.push({
        type: "dragOver",
        id: zone.id,
        source: drag.source,
        position: drag.position,
        local: { x: drag.position.x - zone.bounds.x, y: drag.position.y - zone.bounds.y },
      });
    }
  }
}
