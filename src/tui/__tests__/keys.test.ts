import { describe, expect, it } from "vitest";
import { keyToAction } from "../keys.ts";

describe("keyToAction", () => {
  it("maps the letter shortcuts", () => {
    expect(keyToAction("r", { name: "r" })).toBe("refresh");
    expect(keyToAction("w", { name: "w" })).toBe("next_workspace");
    expect(keyToAction("W", { name: "w", shift: true })).toBe("prev_workspace");
    expect(keyToAction("a", { name: "a" })).toBe("all_workspaces");
    expect(keyToAction("s", { name: "s" })).toBe("settings");
    expect(keyToAction("c", { name: "c" })).toBe("clear_token");
    expect(keyToAction("q", { name: "q" })).toBe("quit");
  });

  it("quits on Ctrl-C rather than clearing the token", () => {
    expect(keyToAction("\u0003", { name: "c", ctrl: true })).toBe("quit");
  });

  it("maps navigation keys", () => {
    expect(keyToAction(undefined, { name: "right" })).toBe("next_workspace");
    expect(keyToAction(undefined, { name: "left" })).toBe("prev_workspace");
    expect(keyToAction("\t", { name: "tab", shift: true })).toBe("prev_workspace");
    expect(keyToAction(undefined, { name: "f5" })).toBe("refresh");
  });

  it("ignores everything else", () => {
    expect(keyToAction("x", { name: "x" })).toBeUndefined();
    expect(keyToAction("constructor", undefined)).toBeUndefined();
    expect(keyToAction(undefined, undefined)).toBeUndefined();
  });
});
