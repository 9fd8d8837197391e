jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

import { BadgeLevel, ScoredNetwork } from "@core/types";
import { ScoreError, ScoreErrorCode } from "@core/errors";
import { ScoreLineParser } from "../ScoreLineParser";

const METERED_LINE =
  '"Metered",aa:bb:cc:dd:ee:ff|10,-128,-128,-128,-128,-128,-128,-128,-128,20,20,20,20,-128|1|0|4K';
const CAPTIVE_LINE =
  '"Captive",ff:ee:dd:cc:bb:aa|18,-128,-128,-128,-128,-128,-128,21,21,21,-128|0|1|HD';
const ANY_LINE =
  '"AnySsid",00:00:00:00:00:00|18,-128,-128,-128,-128,-128,-128,22,22,22,-128|0|0|NONE';

describe("ScoreLineParser", () => {
  const parser = new ScoreLineParser();

  const parseOk = (line: string): ScoredNetwork => {
    const result = parser.parse(line);
    if (!result.success) {
      throw result.error;
    }
    return result.data;
  };

  const parseError = (line: string): Error => {
    const result = parser.parse(line);
    if (result.success) {
      throw new Error(`expected ${line} to be rejected`);
    }
    return result.error;
  };

  describe("parse", () => {
    it("should parse a metered 4K score", () => {
      const network = parseOk(METERED_LINE);

      expect(network.networkKey).toEqual({
        ssid: '"Metered"',
        bssid: "aa:bb:cc:dd:ee:ff",
      });
      expect(network.curve).toEqual({
        start: -150,
        bucketWidth: 10,
        buckets: [-128, -128, -128, -128, -128, -128, -128, -128, 20, 20, 20, 20, -128],
      });
      expect(network.meteredHint).toBe(true);
      expect(network.hasCaptivePortal).toBe(false);
      expect(network.badgeLevel).toBe(BadgeLevel.UHD_4K);
      expect(network.badgeCurve).toEqual({
        start: -150,
        bucketWidth: 1,
        buckets: [30],
      });
    });

    it("should parse a captive portal HD score", () => {
      const network = parseOk(CAPTIVE_LINE);

      expect(network.curve.bucketWidth).toBe(18);
      expect(network.curve.buckets).toHaveLength(10);
      expect(network.meteredHint).toBe(false);
      expect(network.hasCaptivePortal).toBe(true);
      expect(network.badgeLevel).toBe(BadgeLevel.HD);
      expect(network.badgeCurve?.buckets).toEqual([20]);
    });

    it("should leave the badge curve out for NONE", () => {
      const network = parseOk(ANY_LINE);

      expect(network.badgeLevel).toBe(BadgeLevel.NONE);
      expect(network.badgeCurve).toBeUndefined();
    });

    it("should accept 'any' as the wildcard bssid", () => {
      const network = parseOk('"Cafe",any|10,5|0|0|SD');

      expect(network.networkKey.bssid).toBe("00:00:00:00:00:00");
    });

    it("should lower-case the bssid", () => {
      const network = parseOk('"Cafe",AA:BB:CC:DD:EE:FF|10,5|0|0|SD');

      expect(network.networkKey.bssid).toBe("aa:bb:cc:dd:ee:ff");
    });

    it("should keep commas inside the ssid", () => {
      const network = parseOk('"Bar, Grill",aa:bb:cc:dd:ee:ff|10,5|0|0|SD');

      expect(network.networkKey.ssid).toBe('"Bar, Grill"');
    });

    it("should accept hex ssids", () => {
      const network = parseOk("0x4d79,aa:bb:cc:dd:ee:ff|10,5|0|0|SD");

      expect(network.networkKey.ssid).toBe("0x4d79");
    });

    it.each([
      ["too few fields", '"Cafe",aa:bb:cc:dd:ee:ff|10,5|0|0'],
      ["missing bssid", '"Cafe"|10,5|0|0|SD'],
      ["unquoted ssid", "Cafe,aa:bb:cc:dd:ee:ff|10,5|0|0|SD"],
      ["bad bssid", '"Cafe",aa:bb:cc:dd:ee|10,5|0|0|SD'],
      ["width only", '"Cafe",aa:bb:cc:dd:ee:ff|10|0|0|SD'],
      ["non-integer sample", '"Cafe",aa:bb:cc:dd:ee:ff|10,5.5|0|0|SD'],
      ["sample out of range", '"Cafe",aa:bb:cc:dd:ee:ff|10,200|0|0|SD'],
      ["zero width", '"Cafe",aa:bb:cc:dd:ee:ff|0,5|0|0|SD'],
      ["bad metered flag", '"Cafe",aa:bb:cc:dd:ee:ff|10,5|yes|0|SD'],
      ["bad captive flag", '"Cafe",aa:bb:cc:dd:ee:ff|10,5|0|2|SD'],
      ["unknown badge", '"Cafe",aa:bb:cc:dd:ee:ff|10,5|0|0|8K'],
    ])("should reject a line with %s", (_reason, line) => {
      const error = parseError(line);

      expect(error).toBeInstanceOf(ScoreError);
      expect(error).toMatchObject({ code: ScoreErrorCode.MALFORMED_LINE });
    });
  });

  describe("format", () => {
    it("should write a score in the line format", () => {
      expect(parser.format(parseOk(METERED_LINE))).toBe(METERED_LINE);
    });

    it("should write NONE for scores without a badge", () => {
      expect(parser.format(parseOk(ANY_LINE))).toBe(ANY_LINE);
    });
  });
});
