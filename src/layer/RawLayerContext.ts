/**
 * Raw Layer Context
 *
 * Passed to a raw layer's render callback. Records shader invocations
 * instead of drawing; the renderer replays them in order.
 */

import { DrawList } from "../draw/DrawList";
import { tessellatePolygon } from "../geometry/tessellate";
import type { Ring } from "../geometry/types";
import type { Size } from "../math/rect";
import type { Color } from "../types/color";
import type { RawCommand, UniformValue } from "./types";

export class RawLayerContext {
  readonly size: Size;
  readonly scaleFactor: number;
  readonly commands = new DrawList<RawCommand>();
  private readonly onRequestFrame: () => void;

  constructor(size: Size, scaleFactor: number, onRequestFrame: () => void) {
    this.size = size;
    this.scaleFactor = scaleFactor;
    this.onRequestFrame = onRequestFrame;
  }

  /** Run a shader over the whole layer */
  fullscreenQuad(shader: string, uniforms: Record<string, UniformValue> = {}): void {
    this.commands.append({ kind: "fullscreenQuad", shader, uniforms: { ...uniforms } });
  }

  /** Draw indexed triangles in a solid color */
  triangles(vertices: Float32Array, indices: Uint16Array | Uint32Array, color: Color): void {
    if (indices.length === 0) return;
    this.commands.append({ kind: "triangles", vertices, indices, color });
  }

  /**
   * Fill a polygon with optional holes. Degenerate rings emit nothing.
   */
  fillPolygon(ring: Ring, holes: Ring[], color: Color): void {
    if (ring.length < 3) return;
    const { vertices, indices } = tessellatePolygon(ring, holes);
    this.triangles(vertices, indices, color);
  }

  /** Ask for another frame after this one (animation) */
  requestFrame(): void {
    this.onRequestFrame();
  }
}
