/**
 * Draw list batching
 *
 * Merges consecutive commands with the same batch key. Merging never
 * crosses a clip change or a change of command kind, so paint order is
 * exactly the draw list order.
 */

import type { Rect } from "../math/rect";
import type { DrawList } from "../draw/DrawList";
import type { DrawCommand } from "../draw/types";
import { batchKeyEquals, createBatchKey } from "./BatchKey";
import { isPaintCommand, type DrawBatch } from "./types";

export function batchDrawList(list: DrawList<DrawCommand>): DrawBatch[] {
  const batches: DrawBatch[] = [];
  const clipStack: Rect[] = [];
  let current: DrawBatch | null = null;

  for (const entry of list.entries()) {
    const command = entry.command;

    if (command.kind === "pushClip") {
      clipStack.push(command.rect);
      current = null;
      continue;
    }
    if (command.kind === "popClip") {
      clipStack.pop();
      current = null;
      continue;
    }
    if (!isPaintCommand(command)) continue;

    const clip = clipStack[clipStack.length - 1] ?? null;
    const key = createBatchKey(command.kind, clipStack.length, clip);

    if (current && batchKeyEquals(current.key, key)) {
      current.commands.push(command);
    } else {
      current = { key, commands: [command], firstOrder: entry.order };
      batches.push(current);
    }
  }

  return batches;
}
