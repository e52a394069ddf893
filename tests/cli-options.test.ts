import { describe, expect, test } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseLimit, parseNamespaceId } from "../packages/cli/src/utils/format.js";

describe("command-line option parsers", () => {
  test("limits are positive whole numbers", () => {
    expect(parseLimit("25")).toBe(25);
    expect(() => parseLimit("many")).toThrow(InvalidArgumentError);
    expect(() => parseLimit("0")).toThrow(InvalidArgumentError);
    expect(() => parseLimit("2.5")).toThrow(InvalidArgumentError);
  });

  test("namespace IDs are whole numbers, negative for virtual namespaces", () => {
    expect(parseNamespaceId("10")).toBe(10);
    expect(parseNamespaceId("-1")).toBe(-1);
    expect(() => parseNamespaceId("Template")).toThrow(InvalidArgumentError);
    expect(() => parseNamespaceId("")).toThrow(InvalidArgumentError);
  });
});
