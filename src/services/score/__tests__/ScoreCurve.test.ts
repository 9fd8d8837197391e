import { BadgeLevel, ScoredNetwork } from "@core/types";
import { ScoreError, ScoreErrorCode } from "@core/errors";
import {
  badgeCurveFor,
  calculateBadge,
  createConstantCurve,
  createScoreCurve,
  lookupScore,
} from "../ScoreCurve";

// -150 dBm start, 10 dB buckets; only -70..-31 scores 20
const curve = createScoreCurve(
  -150,
  10,
  [-128, -128, -128, -128, -128, -128, -128, -128, 20, 20, 20, 20, -128],
);

const scored = (badgeLevel: BadgeLevel): ScoredNetwork => ({
  networkKey: { ssid: '"Cafe"', bssid: "aa:bb:cc:dd:ee:ff" },
  curve,
  meteredHint: false,
  hasCaptivePortal: false,
  badgeLevel,
  badgeCurve: badgeCurveFor(badgeLevel),
});

describe("ScoreCurve", () => {
  describe("lookupScore", () => {
    it("should return the bucket containing the rssi", () => {
      expect(lookupScore(curve, -70)).toBe(20);
      expect(lookupScore(curve, -31)).toBe(20);
    });

    it("should treat the bucket start as inclusive and its end as exclusive", () => {
      expect(lookupScore(curve, -71)).toBe(-128);
      expect(lookupScore(curve, -30)).toBe(-128);
    });

    it("should clamp readings below the curve to the first bucket", () => {
      expect(lookupScore(createScoreCurve(-100, 10, [5, 6, 7]), -200)).toBe(5);
    });

    it("should clamp readings above the curve to the last bucket", () => {
      expect(lookupScore(createScoreCurve(-100, 10, [5, 6, 7]), 115)).toBe(7);
    });
  });

  describe("createScoreCurve", () => {
    it("should reject a curve without buckets", () => {
      expect(() => createScoreCurve(-150, 10, [])).toThrow(ScoreError);
    });

    it("should reject a bucket width below 1", () => {
      expect(() => createScoreCurve(-150, 0, [1])).toThrow(
        "Invalid score curve: bucket width 0",
      );
    });

    it("should reject samples outside the signed byte range", () => {
      let caught: unknown;
      try {
        createScoreCurve(-150, 10, [127, 128]);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(ScoreError);
      expect(caught).toMatchObject({ code: ScoreErrorCode.INVALID_CURVE });
    });

    it("should return a frozen curve", () => {
      const created = createScoreCurve(-150, 10, [1, 2]);
      expect(Object.isFrozen(created)).toBe(true);
      expect(Object.isFrozen(created.buckets)).toBe(true);
    });
  });

  describe("createConstantCurve", () => {
    it("should yield the same value for every rssi", () => {
      const constant = createConstantCurve(30);
      expect(lookupScore(constant, -127)).toBe(30);
      expect(lookupScore(constant, -20)).toBe(30);
    });
  });

  describe("calculateBadge", () => {
    it("should read the badge curve at the rssi", () => {
      expect(calculateBadge(scored(BadgeLevel.HD), -60)).toBe(BadgeLevel.HD);
    });

    it("should return NONE without a badge curve", () => {
      expect(badgeCurveFor(BadgeLevel.NONE)).toBeUndefined();
      expect(calculateBadge(scored(BadgeLevel.NONE), -60)).toBe(
        BadgeLevel.NONE,
      );
    });

    it("should return NONE when the curve holds an unknown level", () => {
      const network = { ...scored(BadgeLevel.SD), badgeCurve: createConstantCurve(7) };
      expect(calculateBadge(network, -60)).toBe(BadgeLevel.NONE);
    });
  });
});
