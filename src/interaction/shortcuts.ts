/**
 * Keyboard Shortcuts
 *
 * Registry of key combinations bound to named actions. A shortcut is active
 * globally, while one widget holds focus, or while a named context is
 * active. When several match, the highest priority wins; ties go to the
 * earliest registration.
 *
 * Text form: modifiers joined with "+" before the key, e.g. "ctrl+s",
 * "shift+meta+z", "escape". "cmd" and "command" are aliases for "meta".
 */

import { EngineError } from "../errors";
import type { WidgetId } from "../ui/IdStack";
import { NO_MODIFIERS, type Modifiers } from "./InputEvent";

export type ShortcutId = number;

export interface Shortcut {
  /** Normalized key: single characters lower-cased, named keys as reported by the platform */
  key: string;
  modifiers: Readonly<Modifiers>;
}

export type ShortcutScope =
  | { kind: "global" }
  | { kind: "focused"; id: WidgetId }
  | { kind: "context"; context: string };

export const GLOBAL_SCOPE: Readonly<ShortcutScope> = Object.freeze({ kind: "global" });

export interface ShortcutInfo {
  id: ShortcutId;
  shortcut: Shortcut;
  action: string;
  description?: string;
  scope: ShortcutScope;
  priority: number;
  enabled: boolean;
}

export interface RegisterShortcutOptions {
  scope?: ShortcutScope;
  /** Higher wins when several shortcuts match */
  priority?: number;
  description?: string;
  enabled?: boolean;
}

export interface ShortcutMatch {
  id: ShortcutId;
  action: string;
}

/** Enabled shortcuts bound to the same combination in the same scope */
export interface ShortcutConflict {
  shortcut: Shortcut;
  ids: ShortcutId[];
  actions: string[];
}

// ==================== Keys ====================

const KEY_ALIASES: Readonly<Record<string, string>> = {
  space: " ",
  esc: "Escape",
  escape: "Escape",
  enter: "Enter",
  return: "Enter",
  tab: "Tab",
  up: "ArrowUp",
  down: "ArrowDown",
  left: "ArrowLeft",
  right: "ArrowRight",
  pageup: "PageUp",
  pagedown: "PageDown",
  plus: "+",
};

const KEY_SYMBOLS: Readonly<Record<string, string>> = {
  ArrowUp: "↑",
  ArrowDown: "↓",
  ArrowLeft: "←",
  ArrowRight: "→",
  Enter: "↩",
  Tab: "⇥",
  " ": "Space",
  Backspace: "⌫",
  Delete: "⌦",
  Escape: "⎋",
  Home: "↖",
  End: "↘",
  PageUp: "⇞",
  PageDown: "⇟",
};

/** Letters match regardless of case, since Shift changes the reported key */
export function normalizeKey(key: string): string {
  return key.length === 1 ? key.toLowerCase() : key;
}

function keyFromName(name: string): string {
  const lower = name.toLowerCase();
  const alias = KEY_ALIASES[lower];
  if (alias !== undefined) return alias;
  if (name.length === 1) return lower;
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

/**
 * Build a shortcut from a key and the modifiers it requires. Modifiers not
 * named must be released for the shortcut to match.
 */
export function shortcut(key: string, modifiers: Partial<Modifiers> = {}): Shortcut {
  return { key: normalizeKey(key), modifiers: { ...NO_MODIFIERS, ...modifiers } };
}

/**
 * Parse "ctrl+shift+z"-style text. Throws invalid-shortcut on unknown
 * or repeated modifiers and on a missing key.
 */
export function parseShortcut(text: string): Shortcut {
  // A trailing "+" is the plus key itself
  const pieces =
    text === "+" ? ["+"] : text.endsWith("++") ? [...text.slice(0, -2).split("+"), "+"] : text.split("+");
  const modifiers: Modifiers = { ...NO_MODIFIERS };
  const seen = new Set<keyof Modifiers>();

  for (let i = 0; i < pieces.length - 1; i++) {
    const modifier = modifierName(pieces[i] ?? "");
    if (modifier === null) {
      throw new EngineError("invalid-shortcut", `"${pieces[i] ?? ""}" is not a modifier in "${text}"`);
    }
    if (seen.has(modifier)) {
      throw new EngineError("invalid-shortcut", `Duplicate modifier "${modifier}" in "${text}"`);
    }
    seen.add(modifier);
    modifiers[modifier] = true;
  }

  const keyName = pieces[pieces.length - 1] ?? "";
  if (keyName.length === 0 || modifierName(keyName) !== null) {
    throw new EngineError("invalid-shortcut", `No key in "${text}"`);
  }
  return { key: keyFromName(keyName), modifiers };
}

function modifierName(piece: string): keyof Modifiers | null {
  switch (piece.toLowerCase()) {
    case "shift":
      return "shift";
    case "ctrl":
    case "control":
      return "ctrl";
    case "alt":
    case "option":
      return "alt";
    case "meta":
    case "cmd":
    case "command":
      return "meta";
    default:
      return null;
  }
}

export function shortcutMatches(target: Shortcut, key: string, modifiers: Readonly<Modifiers>): boolean {
  return (
    target.key === normalizeKey(key) &&
    target.modifiers.shift === modifiers.shift &&
    target.modifiers.ctrl === modifiers.ctrl &&
    target.modifiers.alt === modifiers.alt &&
    target.modifiers.meta === modifiers.meta
  );
}

/** Menu-style label, e.g. "⇧⌘Z" */
export function formatShortcut(target: Shortcut): string {
  let label = "";
  if (target.modifiers.ctrl) label += "⌃";
  if (target.modifiers.alt) label += "⌥";
  if (target.modifiers.shift) label += "⇧";
  if (target.modifiers.meta) label += "⌘";
  const symbol = KEY_SYMBOLS[target.key];
  return label + (symbol ?? (target.key.length === 1 ? target.key.toUpperCase() : target.key));
}

function comboKey(target: Shortcut): string {
  const { shift, ctrl, alt, meta } = target.modifiers;
  return `${ctrl ? "c" : ""}${alt ? "a" : ""}${shift ? "s" : ""}${meta ? "m" : ""}:${target.key}`;
}

function scopeKey(scope: ShortcutScope): string {
  switch (scope.kind) {
    case "global":
      return "global";
    case "focused":
      return `focused:${scope.id}`;
    case "context":
      return `context:${scope.context}`;
  }
}

// ==================== Registry ====================

export class ShortcutRegistry {
  private shortcuts = new Map<ShortcutId, ShortcutInfo>();
  private nextId: ShortcutId = 1;
  private activeContext: string | null = null;

  /**
   * Bind a combination (object or text form) to an action.
   */
  register(target: Shortcut | string, action: string, options: RegisterShortcutOptions = {}): ShortcutId {
    const id = this.nextId++;
    this.shortcuts.set(id, {
      id,
      shortcut: typeof target === "string" ? parseShortcut(target) : target,
      action,
      description: options.description,
      scope: options.scope ?? GLOBAL_SCOPE,
      priority: options.priority ?? 0,
      enabled: options.enabled ?? true,
    });
    return id;
  }

  /** Returns false when the id is not registered */
  unregister(id: ShortcutId): boolean {
    return this.shortcuts.delete(id);
  }

  setEnabled(id: ShortcutId, enabled: boolean): void {
    const info = this.shortcuts.get(id);
    if (info) info.enabled = enabled;
  }

  /** Change the combination of a registered shortcut */
  rebind(id: ShortcutId, target: Shortcut | string): boolean {
    const info = this.shortcuts.get(id);
    if (!info) return false;
    info.shortcut = typeof target === "string" ? parseShortcut(target) : target;
    return true;
  }

  /** Activate the context whose context-scoped shortcuts apply, or none */
  setActiveContext(context: string | null): void {
    this.activeContext = context;
  }

  getActiveContext(): string | null {
    return this.activeContext;
  }

  /**
   * Every enabled shortcut in scope for this key press, best first.
   */
  findMatches(key: string, modifiers: Readonly<Modifiers>, focused: WidgetId | null): ShortcutMatch[] {
    const matches: ShortcutInfo[] = [];
    for (const info of this.shortcuts.values()) {
      if (!info.enabled) continue;
      if (!shortcutMatches(info.shortcut, key, modifiers)) continue;
      if (!this.inScope(info.scope, focused)) continue;
      matches.push(info);
    }
    // Map iteration follows registration order, and sort is stable
    matches.sort((a, b) => b.priority - a.priority);
    return matches.map((info) => ({ id: info.id, action: info.action }));
  }

  findMatch(key: string, modifiers: Readonly<Modifiers>, focused: WidgetId | null): ShortcutMatch | null {
    return this.findMatches(key, modifiers, focused)[0] ?? null;
  }

  get(id: ShortcutId): Readonly<ShortcutInfo> | null {
    return this.shortcuts.get(id) ?? null;
  }

  all(): Readonly<ShortcutInfo>[] {
    return [...this.shortcuts.values()];
  }

  /** Label of the first enabled shortcut bound to an action */
  hint(action: string): string | null {
    for (const info of this.shortcuts.values()) {
      if (info.enabled && info.action === action) return formatShortcut(info.shortcut);
    }
    return null;
  }

  /**
   * Groups of enabled shortcuts that share a combination and a scope.
   * Shortcuts in different scopes may overlap freely.
   */
  detectConflicts(): ShortcutConflict[] {
    const groups = new Map<string, ShortcutInfo[]>();
    for (const info of this.shortcuts.values()) {
      if (!info.enabled) continue;
      const key = `${scopeKey(info.scope)}|${comboKey(info.shortcut)}`;
      const group = groups.get(key) ?? [];
      group.push(info);
      groups.set(key, group);
    }

    const conflicts: ShortcutConflict[] = [];
    for (const group of groups.values()) {
      const [first] = group;
      if (!first || group.length < 2) continue;
      conflicts.push({
        shortcut: first.shortcut,
        ids: group.map((info) => info.id),
        actions: group.map((info) => info.action),
      });
    }
    return conflicts;
  }

  clear(): void {
    this.shortcuts.clear();
  }

  get size(): number {
    return this.shortcuts.size;
  }

  private inScope(scope: ShortcutScope, focused: WidgetId | null): boolean {
    switch (scope.kind) {
      case "global":
        return true;
      case "focused":
        return focused === scope.id;
      case "context":
        return this.activeContext === scope.context;
    }
  }
}
