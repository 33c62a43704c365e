/**
 * Raw Layer
 *
 * Bypasses the UI context: the render callback records shader invocations
 * into a fresh RawLayerContext every frame.
 */

import type { InputEvent } from "../interaction/InputEvent";
import type { InteractionEvent } from "../interaction/types";
import { RawLayerContext } from "./RawLayerContext";
import {
  resolveLayerOptions,
  type Layer,
  type LayerEnvironment,
  type LayerFrame,
  type LayerId,
  type RawLayerDefinition,
  type RawLayerOutput,
  type ResolvedLayerOptions,
} from "./types";

export class RawLayer implements Layer {
  readonly kind = "raw";
  readonly id: LayerId;
  readonly zIndex: number;
  readonly sequence: number;
  readonly options: ResolvedLayerOptions;

  private readonly definition: RawLayerDefinition;
  private readonly env: LayerEnvironment;

  constructor(id: LayerId, zIndex: number, sequence: number, definition: RawLayerDefinition, env: LayerEnvironment) {
    this.id = id;
    this.zIndex = zIndex;
    this.sequence = sequence;
    this.definition = definition;
    this.env = env;
    this.options = resolveLayerOptions(definition.options);
  }

  render(frame: LayerFrame): RawLayerOutput {
    const ctx = new RawLayerContext({ ...frame.size }, frame.scaleFactor, () => this.env.requestFrame());
    this.definition.render(ctx);
    return {
      kind: "raw",
      id: this.id,
      zIndex: this.zIndex,
      options: this.options,
      drawList: ctx.commands,
    };
  }

  handleInput(event: InputEvent): InteractionEvent[] {
    this.definition.onInput?.(event);
    return [];
  }

  dispose(): void {}
}
