import { describe, expect, test } from "vitest";
import { classifyResponse } from "../packages/core/src/mutation/classify.js";
import {
  PermissionError,
  ProtocolError,
  SessionError,
  TransientError,
  isWikiError,
  type WikiError,
} from "../packages/core/src/api/errors.js";

const EDIT = { element: "edit", result: "Success" };

function errorOf(code: string): string {
  return `<?xml version="1.0"?><api><error code="${code}" info="details"/></api>`;
}

function thrown(fn: () => unknown): WikiError {
  try {
    fn();
  } catch (error) {
    if (isWikiError(error)) return error;
    throw error;
  }
  throw new Error("expected a throw");
}

describe("mutation response classification", () => {
  test("recognizes success markers", () => {
    expect(classifyResponse('<api><edit result="Success" title="A"/></api>', "edit", EDIT)).toEqual({
      outcome: "success",
    });
    expect(classifyResponse('<api><delete title="A" logid="1"/></api>', "delete", { element: "delete" })).toEqual({
      outcome: "success",
    });
  });

  test("an unrecognized response is retryable", () => {
    const error = thrown(() => classifyResponse('<api><edit result="Failure"/></api>', "edit", EDIT));
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error.retryable).toBe(true);
  });

  test("an empty response is fatal", () => {
    const error = thrown(() => classifyResponse("  ", "edit", EDIT));
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error.retryable).toBe(false);
  });

  test("ignorable codes end the mutation quietly", () => {
    expect(classifyResponse(errorOf("alreadyrolled"), "rollback", { element: "rollback" }, ["alreadyrolled"])).toEqual({
      outcome: "ignored",
      code: "alreadyrolled",
    });
  });

  test.each([
    ["ratelimited", TransientError, true],
    ["readonly", TransientError, true],
    ["protectedpage", PermissionError, false],
    ["cascadeprotected", PermissionError, false],
    ["permissiondenied", PermissionError, false],
    ["blocked", SessionError, false],
    ["autoblocked", SessionError, false],
    ["unknownerror", ProtocolError, false],
    ["badtoken", ProtocolError, true],
  ] as const)("%s", (code, type, retryable) => {
    const error = thrown(() => classifyResponse(errorOf(code), "edit", EDIT));
    expect(error).toBeInstanceOf(type);
    expect(error.retryable).toBe(retryable);
  });

  test("maps cascade protection to its own reason", () => {
    const error = thrown(() => classifyResponse(errorOf("cascadeprotected"), "edit", EDIT));
    expect(error instanceof PermissionError && error.reason).toBe("cascade-protected");
  });
});
