/**
 * UI Layer
 *
 * One UIContext with its own interaction system; entities come from the
 * shared store so state can outlive the layer that created it.
 */

import { batchDrawList } from "../batch/batchDrawList";
import type { InputEvent } from "../interaction/InputEvent";
import type { InteractionEvent } from "../interaction/types";
import { UIContext } from "../ui/UIContext";
import {
  resolveLayerOptions,
  type Layer,
  type LayerEnvironment,
  type LayerFrame,
  type LayerId,
  type ResolvedLayerOptions,
  type UiLayerDefinition,
  type UiLayerOutput,
} from "./types";

export class UiLayer implements Layer {
  readonly kind = "ui";
  readonly id: LayerId;
  readonly zIndex: number;
  readonly sequence: number;
  readonly options: ResolvedLayerOptions;
  readonly ui: UIContext;

  private readonly definition: UiLayerDefinition;
  private readonly env: LayerEnvironment;

  constructor(id: LayerId, zIndex: number, sequence: number, definition: UiLayerDefinition, env: LayerEnvironment) {
    this.id = id;
    this.zIndex = zIndex;
    this.sequence = sequence;
    this.definition = definition;
    this.env = env;
    this.options = resolveLayerOptions(definition.options);
    this.ui = new UIContext({ ...definition.ui, entities: env.entities });
  }

  render(frame: LayerFrame): UiLayerOutput {
    const ui = this.ui;
    ui.beginFrame(frame);
    try {
      this.definition.render({
        ui,
        size: ui.size,
        scaleFactor: ui.scaleFactor,
        requestFrame: () => this.env.requestFrame(),
      });
    } catch (error) {
      ui.abortFrame();
      throw error;
    }
    const { drawList, hoverChanged } = ui.endFrame();
    // Widgets react to enter/leave on the next pass
    if (hoverChanged) this.env.requestFrame();

    return {
      kind: "ui",
      id: this.id,
      zIndex: this.zIndex,
      options: this.options,
      drawList,
      batches: batchDrawList(drawList),
    };
  }

  handleInput(event: InputEvent): InteractionEvent[] {
    return this.ui.interaction.handleInput(event);
  }

  dispose(): void {
    this.ui.dispose();
  }
}
