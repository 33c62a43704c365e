/**
 * Renderer that keeps what it was given instead of drawing it. Useful for
 * headless hosts and tests.
 */

import type { LayerFrame, LayerOutput, Renderer } from "./types";

export interface RecordedFrame {
  outputs: readonly LayerOutput[];
  frame: LayerFrame;
}

export class RecordingRenderer implements Renderer {
  readonly frames: RecordedFrame[] = [];

  submit(outputs: readonly LayerOutput[], frame: LayerFrame): void {
    this.frames.push({ outputs: [...outputs], frame: { ...frame } });
  }

  get last(): RecordedFrame | null {
    return this.frames[this.frames.length - 1] ?? null;
  }
}
