/**
 * Tests for sprintf-style formatting with lazy evaluation
 */

import { afterEach, expect, test, vi } from "vitest";
import { formatError, lazyError, lazyHex, sprint, sprintf, sprintln, toHex } from "../mod.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

test("sprintf formats strings and integers", () => {
  expect(sprintf("Hello %s", "world")).toBe("Hello world");
  expect(sprintf("User %s has ID %d", "john", 123)).toBe("User john has ID 123");
  expect(sprintf("Integer: %d", 42)).toBe("Integer: 42");
});

test("sprintf formats various numeric verbs", () => {
  expect(sprintf("Float: %.2f", 3.14159)).toBe("Float: 3.14");
  expect(sprintf("Hex: %x", 255)).toBe("Hex: ff");
  expect(sprintf("Address: 0x%X", 255)).toBe("Address: 0xFF");
  expect(sprintf("Octal: %o", 8)).toBe("Octal: 10");
  expect(sprintf("Binary: %b", 5)).toBe("Binary: 101");
  expect(sprintf("Signed: %+d", 5)).toBe("Signed: +5");
});

test("sprintf applies width, padding and alignment", () => {
  expect(sprintf("[%5d]", 42)).toBe("[   42]");
  expect(sprintf("[%05d]", 42)).toBe("[00042]");
  expect(sprintf("[%-5s]", "ab")).toBe("[ab   ]");
});

test("sprintf supports positional arguments", () => {
  expect(sprintf("%2$s %1$s", "a", "b")).toBe("b a");
});

test("sprintf handles multiple arguments", () => {
  expect(sprintf("User %s (ID: %d) logged in from %s at %s", "alice", 456, "192.168.1.1", "2024-01-01"))
    .toBe("User alice (ID: 456) logged in from 192.168.1.1 at 2024-01-01");
});

test("sprintf without arguments leaves placeholders in place", () => {
  expect(sprintf("Plain message with no formatting")).toBe("Plain message with no formatting");
  expect(sprintf("missing %s and %d")).toBe("missing %s and %d");
  expect(sprintf("")).toBe("");
});

test("sprintf collapses %% with or without arguments", () => {
  expect(sprintf("100%% of %s", "tests")).toBe("100% of tests");
  expect(sprintf("Progress: 50%% complete")).toBe("Progress: 50% complete");
  expect(sprintf("%%%%d")).toBe("%%d");
});

test("sprintf keeps special characters", () => {
  expect(sprintf("Path: %s", "/home/user/file.txt")).toBe("Path: /home/user/file.txt");
  expect(sprintf("JSON: %s", '{"key": "value"}')).toBe('JSON: {"key": "value"}');
});

test("invalid format specifier falls back to raw output", () => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

  expect(sprintf("Invalid: %q", "test")).toBe("Invalid: %q test");
  expect(warn).toHaveBeenCalledTimes(1);
  expect(warn.mock.calls[0][0]).toMatch(/^\[tintlog\] sprintf failed: .*; falling back to raw output$/);
});

test("mismatched argument type falls back to raw output", () => {
  const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

  expect(sprintf("Number: %d", "not a number")).toBe("Number: %d not a number");
  expect(warn).toHaveBeenCalledTimes(1);
});

// Lazy function arguments
test("lazy evaluation: function argument is called once", () => {
  let callCount = 0;
  const lazyValue = () => {
    callCount++;
    return "lazy result";
  };

  expect(sprintf("Result: %s", lazyValue)).toBe("Result: lazy result");
  expect(callCount).toBe(1);
});

test("lazy evaluation: mixed function and non-function arguments", () => {
  const lazyName = () => "Alice";
  expect(sprintf("User %s has ID %d", lazyName, 123)).toBe("User Alice has ID 123");
});

test("lazy evaluation: multiple function arguments", () => {
  expect(sprintf("%s is %d years old from %s", () => "Bob", () => 30, () => "NYC")).toBe("Bob is 30 years old from NYC");
});

test("lazy evaluation: function returning object with JSON format", () => {
  expect(sprintf("Data: %j", () => ({ name: "test", value: 42 }))).toBe('Data: {"name":"test","value":42}');
});

test("lazy evaluation: function that throws is reported and replaced", () => {
  const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
  const throwingFn = () => {
    throw new Error("Intentional test error");
  };

  expect(sprintf("Result: %s", throwingFn)).toBe("Result: [error evaluating lazy argument]");
  expect(errors).toHaveBeenCalledWith("[tintlog] Error evaluating lazy argument: Intentional test error");
});

// sprint / sprintln
test("sprint adds spaces only between two non-string operands", () => {
  expect(sprint("a", 1, 2, "b")).toBe("a1 2b");
  expect(sprint(1, 2)).toBe("1 2");
  expect(sprint("x", "y")).toBe("xy");
  expect(sprint()).toBe("");
});

test("sprint renders objects on one line and evaluates lazy values", () => {
  expect(sprint("obj=", { a: 1, b: [2, 3] })).toBe("obj={ a: 1, b: [ 2, 3 ] }");
  expect(sprint("v=", () => 5)).toBe("v=5");
  expect(sprint(null, undefined, true)).toBe("null undefined true");
});

test("sprintln separates every operand and ends with a newline", () => {
  expect(sprintln("a", 1, "b")).toBe("a 1 b\n");
  expect(sprintln()).toBe("\n");
});

// %j
test("format %j: handles BigInt values in objects", () => {
  const objWithBigInt = {
    name: "test",
    count: 9007199254740993n,
    nested: {
      value: 123n,
    },
  };

  expect(sprintf("Data: %j", objWithBigInt)).toBe('Data: {"name":"test","count":"9007199254740993","nested":{"value":"123"}}');
});

test("format %j: handles circular references", () => {
  const circular: { name: string; value: number; self?: unknown } = { name: "root", value: 42 };
  circular.self = circular;

  expect(sprintf("Circular: %j", circular)).toBe('Circular: {"name":"root","value":42,"self":"[Circular]"}');
});

test("format %j: repeated but acyclic references are serialized twice", () => {
  const shared = { v: 1 };
  expect(sprintf("%j", { a: shared, b: shared })).toBe('{"a":{"v":1},"b":{"v":1}}');
});

test("format %j: handles object with throwing toJSON", () => {
  const badObj = {
    name: "test",
    toJSON() {
      throw new Error("toJSON exploded");
    },
  };

  expect(sprintf("Bad toJSON: %j", badObj)).toBe("Bad toJSON: [Unserializable: toJSON exploded]");
});

test("format %j: width sets the indentation", () => {
  expect(sprintf("%2j", { a: 1 })).toBe('{\n  "a": 1\n}');
});

// %h / %H
test("format %h: formats Uint8Array as lowercase hex", () => {
  expect(sprintf("Bytes: %h", new Uint8Array([0xde, 0xad, 0xbe, 0xef]))).toBe("Bytes: deadbeef");
});

test("format %H: formats Uint8Array as uppercase hex", () => {
  expect(sprintf("Bytes: %H", new Uint8Array([0xde, 0xad, 0xbe, 0xef]))).toBe("Bytes: DEADBEEF");
});

test("format % h: formats with space delimiter", () => {
  expect(sprintf("Bytes: % h", new Uint8Array([0xde, 0xad, 0xbe, 0xef]))).toBe("Bytes: de ad be ef");
});

test("format %.4h: truncates to precision bytes", () => {
  const bytes = new Uint8Array([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);
  expect(sprintf("Truncated: %.4h", bytes)).toBe("Truncated: 01020304... [4 more bytes]");
});

test("format %h: formats ArrayBuffer and number arrays", () => {
  const buffer = new ArrayBuffer(4);
  new Uint8Array(buffer).set([0xca, 0xfe, 0xba, 0xbe]);

  expect(sprintf("Buffer: %h", buffer)).toBe("Buffer: cafebabe");
  expect(sprintf("Numbers: %h", [0x01, 0x02, 0x03, 0x04])).toBe("Numbers: 01020304");
});

test("format %h: mixed with regular verbs", () => {
  const buffer = new Uint8Array([0x01, 0x02]);
  expect(sprintf("Buffer %h has %d bytes", buffer, buffer.length)).toBe("Buffer 0102 has 2 bytes");
  expect(sprintf("Compact %h, Spaced % H", new Uint8Array([0xaa, 0xbb]), new Uint8Array([0xcc, 0xdd])))
    .toBe("Compact aabb, Spaced CC DD");
});

test("format %h: width pads the hex string", () => {
  expect(sprintf("[%6h]", new Uint8Array([0xaa]))).toBe("[    aa]");
});

test("format %h: non-byte values fall back to String", () => {
  expect(sprintf("Null: %h", null)).toBe("Null: null");
  expect(sprintf("String: %h", "not a buffer")).toBe("String: not a buffer");
  expect(sprintf("Empty: %h", new Uint8Array([]))).toBe("Empty: ");
});

// %w
test("format %w: formats Error with stack trace", () => {
  const msg = sprintf("caught: %w", new Error("test error"));
  expect(msg.startsWith("caught: Error: test error\n")).toBe(true);
  expect(msg).toContain("    at ");
});

test("format %w: formats Error without stack", () => {
  const error = new Error("no stack");
  error.stack = undefined;
  expect(sprintf("caught: %w", error)).toBe("caught: Error: no stack");
});

test("format %w: formats non-Error values", () => {
  expect(sprintf("string: %w", "oops")).toBe("string: Non-Error exception: oops");
  expect(sprintf("number: %w", 42)).toBe("number: Non-Error exception: 42");
  expect(sprintf("null: %w", null)).toBe("null: Non-Error exception: null");
});

// toHex / lazyHex
test("toHex supports delimiters, truncation and uppercase", () => {
  const bytes = new Uint8Array([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);
  expect(toHex(bytes)).toBe("01 02 03 04 05 06 07 08");
  expect(toHex(bytes, ":", 2)).toBe("01:02:... [6 more bytes]");
  expect(toHex(new Uint8Array([0xab]), "", undefined, true)).toBe("AB");
  expect(toHex(bytes, "", 8)).toBe("0102030405060708");
});

test("lazyHex: converts Uint8Array to hex string with default space delimiter", () => {
  expect(sprintf("Bytes: %s", lazyHex(new Uint8Array([0xde, 0xad, 0xbe, 0xef])))).toBe("Bytes: de ad be ef");
});

test("lazyHex: converts ArrayBuffer and number arrays", () => {
  const buffer = new ArrayBuffer(4);
  new Uint8Array(buffer).set([0xca, 0xfe, 0xba, 0xbe]);
  expect(sprintf("Buffer: %s", lazyHex(buffer))).toBe("Buffer: ca fe ba be");
  expect(sprintf("Numbers: %s", lazyHex([0x01, 0x02, 0x03, 0x04]))).toBe("Numbers: 01 02 03 04");
});

test("lazyHex: custom and empty delimiters", () => {
  const bytes = new Uint8Array([0xde, 0xad, 0xbe, 0xef]);
  expect(sprintf("Compact: %s", lazyHex(bytes, ""))).toBe("Compact: deadbeef");
  expect(sprintf("Colon: %s", lazyHex(bytes, ":"))).toBe("Colon: de:ad:be:ef");
});

test("lazyHex: maxBytes truncates output", () => {
  const bytes = new Uint8Array([0x01, 0x02, 0x03, 0x04, 0x05, 0x06, 0x07, 0x08]);
  expect(sprintf("Truncated: %s", lazyHex(bytes, " ", 4))).toBe("Truncated: 01 02 03 04 ... [4 more bytes]");
  expect(sprintf("Compact truncated: %s", lazyHex(bytes.subarray(0, 6), "", 3)))
    .toBe("Compact truncated: 010203... [3 more bytes]");
});

test("lazyHex: handles empty array", () => {
  expect(sprintf("Empty: %s", lazyHex(new Uint8Array([])))).toBe("Empty: ");
});

// lazyError / formatError
test("lazyError: formats Error with stack trace", () => {
  const msg = sprintf("caught: %s", lazyError(new Error("test error")));
  expect(msg.startsWith("caught: Error: test error\n")).toBe(true);
});

test("lazyError: formats non-Error values", () => {
  expect(sprintf("string: %s", lazyError("oops"))).toBe("string: Non-Error exception: oops");
  expect(sprintf("number: %s", lazyError(42))).toBe("number: Non-Error exception: 42");
  expect(sprintf("null: %s", lazyError(null))).toBe("null: Non-Error exception: null");
});

test("formatError uses name and message when there is no stack", () => {
  class CustomError extends Error {
    constructor(message: string) {
      super(message);
      this.name = "CustomError";
    }
  }

  const error = new CustomError("Custom error occurred");
  error.stack = undefined;
  expect(formatError(error)).toBe("CustomError: Custom error occurred");
});
