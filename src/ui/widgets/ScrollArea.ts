/**
 * Scroll Area Widget
 *
 * Vertically scrolling, clipped container driven by the mouse wheel, with
 * a scrollbar drawn when the content overflows.
 */

import type { EntityHandle } from "../../entity/types";
import type { IdKey } from "../IdStack";
import type { ContainerResult, UIContext } from "../UIContext";

/** Persistent scroll state */
export interface ScrollState {
  offset: number;
  /** Largest valid offset seen on the last frame */
  maxOffset: number;
}

export function createScrollState(): ScrollState {
  return { offset: 0, maxOffset: Number.POSITIVE_INFINITY };
}

/** Scroll area configuration */
export interface ScrollAreaOptions {
  key?: IdKey;
  height: number;
  width?: number;
  padding?: number;
  spacing?: number;
}

export interface ScrollAreaResult extends ContainerResult {
  offset: number;
  maxOffset: number;
}

/**
 * Render a scroll area around the children declared in body.
 */
export function scrollArea(
  ui: UIContext,
  state: EntityHandle<ScrollState>,
  options: ScrollAreaOptions,
  body: () => void
): ScrollAreaResult {
  const theme = ui.getTheme().scrollbar;
  const id = ui.peekId(options.key);
  const stored = ui.entities.get(state);

  let offset = stored.offset;
  for (const event of ui.eventsFor(id)) {
    if (event.type === "wheel") {
      offset += event.delta.y * theme.wheelStep;
    }
  }
  offset = clamp(offset, 0, stored.maxOffset);

  const result = ui.container(
    {
      key: options.key,
      direction: "vertical",
      width: options.width,
      height: options.height,
      padding: options.padding,
      spacing: options.spacing,
      clip: true,
      interactive: true,
      scrollable: true,
      scrollOffset: { x: 0, y: offset },
    },
    body
  );

  const { bounds, contentSize } = result;
  const maxOffset = Math.max(0, contentSize.height - bounds.height);
  offset = clamp(offset, 0, maxOffset);

  if (offset !== stored.offset || maxOffset !== stored.maxOffset) {
    ui.entities.withMut(state, (scroll) => {
      scroll.offset = offset;
      scroll.maxOffset = maxOffset;
    });
  }

  if (maxOffset > 0) {
    // Track along the right edge
    const track = {
      x: bounds.x + bounds.width - theme.width,
      y: bounds.y,
      width: theme.width,
      height: bounds.height,
    };
    ui.draw({ kind: "rect", rect: track, color: theme.trackColor, cornerRadius: theme.borderRadius });

    const thumbHeight = Math.max(theme.minThumbSize, (bounds.height * bounds.height) / contentSize.height);
    const thumbY = track.y + (offset / maxOffset) * (track.height - thumbHeight);
    ui.draw({
      kind: "rect",
      rect: { x: track.x, y: thumbY, width: track.width, height: thumbHeight },
      color: ui.interactionOf(result.id).hovered ? theme.thumbHoverColor : theme.thumbColor,
      cornerRadius: theme.borderRadius,
    });
  }

  return { ...result, offset, maxOffset };
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
