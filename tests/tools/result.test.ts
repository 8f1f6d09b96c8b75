/**
 * Tests for the tool result wrapper.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { MalformedFramingError } from "../../src/errors.js";
import { toolResult } from "../../src/tools/result.js";

describe("toolResult", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("wraps text output", () => {
    expect(toolResult("list_devices", () => "ok")).toEqual({ content: [{ type: "text", text: "ok" }] });
  });

  it("turns thrown errors into error results and logs them", () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});
    const result = toolResult("inspect_dump", () => {
      throw new MalformedFramingError("data block is empty");
    });
    expect(result).toEqual({
      content: [{ type: "text", text: "Error: MalformedFraming: data block is empty" }],
      isError: true,
    });
    expect(log).toHaveBeenCalledWith("inspect_dump failed: MalformedFraming: data block is empty");
  });
});
