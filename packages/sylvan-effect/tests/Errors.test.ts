import { describe, expect, it } from "@effect/vitest";
import * as Effect from "effect/Effect";
import { ConstraintViolationError, InternalError, PathNotFoundError } from "sylvan";
import {
  MismatchedKindError,
  ValidationFailedError,
  fromUnknown,
} from "../src/Errors";

describe("Errors", () => {
  describe("fromUnknown", () => {
    it("should pass engine errors through", () => {
      const error = new PathNotFoundError({ message: "no match", remainingPath: "/a" });
      expect(fromUnknown(error)).toBe(error);
    });

    it("should wrap other errors as internal errors", () => {
      const cause = new TypeError("boom");
      const wrapped = fromUnknown(cause);

      expect(wrapped).toBeInstanceOf(InternalError);
      expect(wrapped.message).toBe("boom");
      if (wrapped instanceof InternalError) {
        expect(wrapped.cause).toBe(cause);
      }
    });

    it("should wrap thrown non-errors", () => {
      const wrapped = fromUnknown("plain failure");

      expect(wrapped._tag).toBe("InternalError");
      expect(wrapped.message).toBe("plain failure");
    });
  });

  describe("tagged errors", () => {
    it.effect("should be caught by tag", () =>
      Effect.gen(function* () {
        const result = yield* Effect.fail(
          new MismatchedKindError({ step: "eone", existingIsLeaf: true, newIsLeaf: false })
        ).pipe(Effect.catchTag("MismatchedKindError", (error) => Effect.succeed(error.step)));

        expect(result).toBe("eone");
      })
    );

    it("should carry the violations of a failed validation", () => {
      const violation = new ConstraintViolationError("range", "/top/port", "256 is outside the uint8 range");
      const error = new ValidationFailedError({ violations: [violation] });

      expect(error._tag).toBe("ValidationFailedError");
      expect(error.violations[0]?.message).toBe("/top/port: 256 is outside the uint8 range");
    });
  });
});
