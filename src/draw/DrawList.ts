/**
 * Draw List
 *
 * Ordered sequence of draw commands for one layer and one frame. The list
 * never looks inside a command, so raw and UI layers share it.
 */

import type { DrawEntry } from "./types";

/**
 * A reserved position in the list. Containers take one before emitting
 * children and later insert their background there.
 */
export type DrawListPos = number;

export class DrawList<C> {
  private entries_: DrawEntry<C>[] = [];
  private nextOrder = 0;

  /** Number of commands in the list */
  get length(): number {
    return this.entries_.length;
  }

  /**
   * Append a command at the end.
   * @returns index of the command
   */
  append(command: C): number {
    this.entries_.push(this.emit(command));
    return this.entries_.length - 1;
  }

  /**
   * Insert a command before `index`, shifting everything after it.
   * Relative order of earlier emissions is preserved.
   */
  insertBefore(index: DrawListPos, command: C): void {
    if (!Number.isInteger(index) || index < 0 || index > this.entries_.length) {
      throw new RangeError(
        `insertBefore index ${index} out of range [0, ${this.entries_.length}]`
      );
    }
    this.entries_.splice(index, 0, this.emit(command));
  }

  /**
   * Swap the command at `index` for another. The entry keeps its emission
   * order, so sorting by order still reproduces the original sequence.
   */
  replace(index: number, command: C): void {
    const entry = this.entries_[index];
    if (!Number.isInteger(index) || entry === undefined) {
      throw new RangeError(
        `replace index ${index} out of range [0, ${this.entries_.length})`
      );
    }
    this.entries_[index] = Object.freeze({ order: entry.order, command: Object.freeze(command) });
  }

  /** Current end of the list, for later insertBefore() */
  position(): DrawListPos {
    return this.entries_.length;
  }

  /** Commands with their emission order, in paint order */
  entries(): readonly DrawEntry<C>[] {
    return this.entries_;
  }

  /** Commands in paint order */
  commands(): Readonly<C>[] {
    return this.entries_.map((entry) => entry.command);
  }

  isEmpty(): boolean {
    return this.entries_.length === 0;
  }

  /** Drop all commands and restart emission order */
  clear(): void {
    this.entries_ = [];
    this.nextOrder = 0;
  }

  private emit(command: C): DrawEntry<C> {
    return Object.freeze({ order: this.nextOrder++, command: Object.freeze(command) });
  }
}
