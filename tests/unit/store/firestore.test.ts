/**
 * Firestore error mapping tests
 */

import { describe, expect, test } from "vitest";
import { toStoreError } from "../../../src/store/firestore";
import { StoreError } from "../../../src/utils/errors";

function grpcError(code: number, message: string) {
  return Object.assign(new Error(message), { code });
}

describe("toStoreError", () => {
  test.each([
    { code: 5, expected: "not_found" },
    { code: 6, expected: "conflict" },
    { code: 7, expected: "permission" },
    { code: 9, expected: "permission" },
    { code: 3, expected: "invalid" },
    { code: 14, expected: "unavailable" },
    { code: 4, expected: "unavailable" },
  ])("maps gRPC code $code to $expected", ({ code, expected }) => {
    expect(toStoreError(grpcError(code, "boom"), "op").code).toBe(expected);
  });

  test("treats errors without a code as unavailable", () => {
    const error = toStoreError(new Error("socket hang up"), "query Session");

    expect(error.code).toBe("unavailable");
    expect(error.message).toBe("query Session: socket hang up");
  });

  test("passes store errors through", () => {
    const original = new StoreError("conflict", "exists");

    expect(toStoreError(original, "create")).toBe(original);
  });
});
