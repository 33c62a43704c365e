import { describe, it, expect, beforeEach } from "vitest";
import { NO_MODIFIERS } from "./InputEvent";
import {
  GLOBAL_SCOPE,
  ShortcutRegistry,
  formatShortcut,
  normalizeKey,
  parseShortcut,
  shortcut,
  shortcutMatches,
} from "./shortcuts";
import { isEngineError } from "../errors";

const META = { ...NO_MODIFIERS, meta: true };
const META_SHIFT = { ...NO_MODIFIERS, meta: true, shift: true };

describe("parseShortcut", () => {
  it("reads modifiers and a key", () => {
    expect(parseShortcut("ctrl+shift+Z")).toEqual({
      key: "z",
      modifiers: { shift: true, ctrl: true, alt: false, meta: false },
    });
  });

  it("accepts cmd as meta and named keys", () => {
    expect(parseShortcut("cmd+up")).toEqual({ key: "ArrowUp", modifiers: META });
    expect(parseShortcut("escape")).toEqual({ key: "Escape", modifiers: NO_MODIFIERS });
    expect(parseShortcut("f1").key).toBe("F1");
    expect(parseShortcut("space").key).toBe(" ");
  });

  it("reads a trailing plus as the key", () => {
    expect(parseShortcut("ctrl++")).toEqual({ key: "+", modifiers: { ...NO_MODIFIERS, ctrl: true } });
  });

  it("rejects unknown and repeated modifiers", () => {
    expect(() => parseShortcut("hyper+a")).toThrowError('"hyper" is not a modifier in "hyper+a"');
    expect(() => parseShortcut("ctrl+control+a")).toThrowError('Duplicate modifier "ctrl" in "ctrl+control+a"');
  });

  it("rejects a missing key", () => {
    try {
      parseShortcut("ctrl+shift");
      expect.unreachable();
    } catch (error) {
      expect(isEngineError(error, "invalid-shortcut")).toBe(true);
    }
  });
});

describe("shortcutMatches", () => {
  it("requires the exact modifiers", () => {
    const copy = shortcut("c", { meta: true });
    expect(shortcutMatches(copy, "c", META)).toBe(true);
    expect(shortcutMatches(copy, "c", NO_MODIFIERS)).toBe(false);
    expect(shortcutMatches(copy, "c", META_SHIFT)).toBe(false);
    expect(shortcutMatches(copy, "v", META)).toBe(false);
  });

  it("ignores the case Shift gives a letter", () => {
    expect(normalizeKey("Z")).toBe("z");
    expect(normalizeKey("Enter")).toBe("Enter");
    expect(shortcutMatches(parseShortcut("shift+meta+z"), "Z", META_SHIFT)).toBe(true);
  });
});

describe("formatShortcut", () => {
  it("writes modifier symbols before the key", () => {
    expect(formatShortcut(parseShortcut("cmd+c"))).toBe("⌘C");
    expect(formatShortcut(parseShortcut("shift+cmd+z"))).toBe("⇧⌘Z");
    expect(formatShortcut(parseShortcut("ctrl+alt+delete"))).toBe("⌃⌥⌦");
    expect(formatShortcut(parseShortcut("escape"))).toBe("⎋");
  });
});

describe("ShortcutRegistry", () => {
  let registry: ShortcutRegistry;

  beforeEach(() => {
    registry = new ShortcutRegistry();
  });

  it("finds a registered global shortcut", () => {
    const id = registry.register("cmd+c", "copy");
    expect(registry.findMatch("c", META, null)).toEqual({ id, action: "copy" });
    expect(registry.get(id)?.scope).toEqual(GLOBAL_SCOPE);
  });

  it("stops matching after unregister", () => {
    const id = registry.register("cmd+c", "copy");
    expect(registry.unregister(id)).toBe(true);
    expect(registry.unregister(id)).toBe(false);
    expect(registry.findMatch("c", META, null)).toBeNull();
  });

  it("skips disabled shortcuts", () => {
    const id = registry.register("cmd+s", "save");
    registry.setEnabled(id, false);
    expect(registry.findMatch("s", META, null)).toBeNull();
    expect(registry.hint("save")).toBeNull();
  });

  it("orders matches by priority, then registration", () => {
    const low = registry.register("cmd+k", "low");
    const high = registry.register("cmd+k", "high", { priority: 5 });
    const second = registry.register("cmd+k", "low-2");
    expect(registry.findMatches("k", META, null).map((m) => m.id)).toEqual([high, low, second]);
  });

  it("applies focused shortcuts only while that widget has focus", () => {
    registry.register("enter", "submit", { scope: { kind: "focused", id: "field" } });
    expect(registry.findMatch("Enter", NO_MODIFIERS, null)).toBeNull();
    expect(registry.findMatch("Enter", NO_MODIFIERS, "other")).toBeNull();
    expect(registry.findMatch("Enter", NO_MODIFIERS, "field")?.action).toBe("submit");
  });

  it("applies context shortcuts only in the active context", () => {
    registry.register("j", "next-line", { scope: { kind: "context", context: "editor" } });
    expect(registry.findMatch("j", NO_MODIFIERS, null)).toBeNull();
    registry.setActiveContext("editor");
    expect(registry.getActiveContext()).toBe("editor");
    expect(registry.findMatch("j", NO_MODIFIERS, null)?.action).toBe("next-line");
  });

  it("rebinds a shortcut to another combination", () => {
    const id = registry.register("cmd+f", "find");
    expect(registry.rebind(id, shortcut("f", { ctrl: true }))).toBe(true);
    expect(registry.findMatch("f", META, null)).toBeNull();
    expect(registry.findMatch("f", { ...NO_MODIFIERS, ctrl: true }, null)?.action).toBe("find");
    expect(registry.rebind(999, "cmd+g")).toBe(false);
  });

  it("labels an action with its first enabled shortcut", () => {
    registry.register("shift+cmd+z", "redo");
    expect(registry.hint("redo")).toBe("⇧⌘Z");
    expect(registry.hint("missing")).toBeNull();
  });

  it("reports combinations bound twice in one scope", () => {
    const copy = registry.register("cmd+c", "copy");
    const duplicate = registry.register("cmd+c", "duplicate");
    registry.register("cmd+c", "copy-cell", { scope: { kind: "focused", id: "grid" } });
    registry.register("cmd+v", "paste");

    expect(registry.detectConflicts()).toEqual([
      { shortcut: parseShortcut("cmd+c"), ids: [copy, duplicate], actions: ["copy", "duplicate"] },
    ]);
  });

  it("does not count disabled shortcuts as conflicting", () => {
    registry.register("cmd+c", "copy");
    const other = registry.register("cmd+c", "duplicate");
    registry.setEnabled(other, false);
    expect(registry.detectConflicts()).toEqual([]);
  });

  it("lists and clears registrations", () => {
    registry.register("cmd+a", "select-all");
    registry.register("cmd+n", "new");
    expect(registry.all().map((info) => info.action)).toEqual(["select-all", "new"]);
    expect(registry.size).toBe(2);
    registry.clear();
    expect(registry.size).toBe(0);
  });
});
