/**
 * Unit tests for Debug Channels.
 *
 * - Channel enable/disable via SCHEMA_REACTOR_DEBUG
 * - Pretty and JSON formatting
 */
import { describe, test, expect, beforeEach, afterEach } from "vitest";
import {
  configureDebug,
  debug,
  DEBUG_ENV,
  isDebugEnabled,
  refreshDebugChannels,
} from "../../src/shared/debug.js";

// =============================================================================
// Test Helpers
// =============================================================================

function captureOutput(): string[] {
  const messages: string[] = [];
  configureDebug({ output: (msg) => messages.push(msg) });
  return messages;
}

function setDebugEnv(value: string | undefined): void {
  if (value === undefined) {
    delete process.env[DEBUG_ENV];
  } else {
    process.env[DEBUG_ENV] = value;
  }
  refreshDebugChannels();
}

let originalEnv: string | undefined;

beforeEach(() => {
  originalEnv = process.env[DEBUG_ENV];
});

afterEach(() => {
  setDebugEnv(originalEnv);
  configureDebug({ format: "pretty", timestamps: false, output: console.log });
});

// =============================================================================
// Activation
// =============================================================================

describe("debug channel activation", () => {
  test("channels are disabled without the env var", () => {
    setDebugEnv(undefined);
    expect(isDebugEnabled()).toBe(false);
    expect(isDebugEnabled("sort")).toBe(false);
  });

  test("0 and false disable everything", () => {
    setDebugEnv("0");
    expect(isDebugEnabled()).toBe(false);
    setDebugEnv("false");
    expect(isDebugEnabled()).toBe(false);
  });

  test("a list enables only the named channels", () => {
    setDebugEnv("sort, Infer");
    expect(isDebugEnabled("sort")).toBe(true);
    expect(isDebugEnabled("infer")).toBe(true);
    expect(isDebugEnabled("reactor")).toBe(false);
  });

  test("wildcard and 1 enable every channel", () => {
    setDebugEnv("*");
    expect(isDebugEnabled("effective")).toBe(true);
    setDebugEnv("1");
    expect(isDebugEnabled("tree")).toBe(true);
  });

  test("disabled channels write nothing", () => {
    setDebugEnv("sort");
    const messages = captureOutput();
    debug.reactor("phase.done", { phase: "linkage" });
    expect(messages).toEqual([]);
  });
});

// =============================================================================
// Formatting
// =============================================================================

describe("debug output format", () => {
  test("pretty format lists data as key=value pairs", () => {
    setDebugEnv("reactor");
    const messages = captureOutput();
    debug.reactor("phase.done", { phase: "linkage", passes: 2, ok: true });
    expect(messages).toEqual(['[reactor.phase.done] { phase="linkage", passes=2, ok=true }']);
  });

  test("pretty format without data is just the label", () => {
    setDebugEnv("tree");
    const messages = captureOutput();
    debug.tree("start");
    expect(messages).toEqual(["[tree.start]"]);
  });

  test("short arrays are inlined, long ones counted", () => {
    setDebugEnv("sort");
    const messages = captureOutput();
    debug.sort("order", { short: ["a", "b"], long: [1, 2, 3, 4, 5] });
    expect(messages).toEqual(['[sort.order] { short=["a", "b"], long=[5 items] }']);
  });

  test("json format emits one object per call", () => {
    setDebugEnv("infer");
    const messages = captureOutput();
    configureDebug({ format: "json" });
    debug.infer("action.apply", { action: 3 });
    expect(messages.map((m) => JSON.parse(m) as unknown)).toEqual([
      { channel: "infer", point: "action.apply", data: { action: 3 } },
    ]);
  });
});
