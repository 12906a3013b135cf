/**
 * Tests for the runtime companions used when code runs unexpanded
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { debugOnly, here, println, stringify, warn } from "../src/runtime.js";

describe("runtime companions", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints through println", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    println("hello");
    expect(log).toHaveBeenCalledWith("hello");
  });

  it("warns only when the condition is false", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    warn(true, "fine");
    warn(0, "zero");
    expect(log.mock.calls).toEqual([["<unknown location>: zero"]]);
  });

  it("runs debugOnly blocks", () => {
    const fn = vi.fn();
    debugOnly(fn);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("has no source information", () => {
    expect(here()).toBe("<unknown location>");
    expect(stringify(1 + 2)).toBe("3");
  });
});
