import { ScoreError, ScoreErrorCode } from "@errors/ScoreError";
import { BaseError } from "@errors/BaseError";

describe("ScoreError", () => {
  it("should default to the unknown code", () => {
    const error = new ScoreError("Test error");

    expect(error.code).toBe(ScoreErrorCode.UNKNOWN);
    expect(error).toBeInstanceOf(BaseError);
    expect(error.name).toBe("ScoreError");
  });

  describe("static factory methods", () => {
    it("invalidArgument should name the field and value", () => {
      const error = ScoreError.invalidArgument("bssid", "zz:zz");

      expect(error.message).toBe("Invalid bssid for network key: zz:zz");
      expect(error.code).toBe(ScoreErrorCode.INVALID_ARGUMENT);
      expect(error.context).toEqual({ field: "bssid", value: "zz:zz" });
      expect(error.recoverable).toBe(false);
    });

    it("malformedLine should carry the reason and line", () => {
      const error = ScoreError.malformedLine("x|y", "expected 5 fields, got 2");

      expect(error.message).toBe(
        "Malformed score line (expected 5 fields, got 2): x|y",
      );
      expect(error.code).toBe(ScoreErrorCode.MALFORMED_LINE);
    });

    it("invalidCurve should carry the reason", () => {
      expect(ScoreError.invalidCurve("no buckets").message).toBe(
        "Invalid score curve: no buckets",
      );
    });

    it("invalidBadge should name the value", () => {
      const error = ScoreError.invalidBadge("8K");

      expect(error.message).toBe("Unknown badge level: 8K");
      expect(error.code).toBe(ScoreErrorCode.INVALID_BADGE);
    });

    it("publishFailed should be recoverable", () => {
      const error = ScoreError.publishFailed(2, new Error("sink offline"));

      expect(error.message).toBe("Failed to publish 2 score(s): sink offline");
      expect(error.code).toBe(ScoreErrorCode.PUBLISH_FAILED);
      expect(error.recoverable).toBe(true);
    });
  });
});
