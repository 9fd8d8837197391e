import {
  BadgeLevel,
  NetworkKey,
  SavedNetwork,
  ScanObservation,
  ScoredNetwork,
} from "@core/types";
import { badgeCurveFor, createConstantCurve } from "@services/score/ScoreCurve";
import {
  NotificationContentBuilder,
  calculateSignalLevel,
} from "../NotificationContentBuilder";

const NETWORK: SavedNetwork = {
  ssid: "Library",
  bssid: "02:11:22:33:44:55",
  security: "open",
  passpoint: false,
  enabled: true,
  useExternalScores: false,
  hasNoInternetAccess: false,
  noInternetAccessExpected: false,
};

const scanAt = (rssi: number, bssid = "02:11:22:33:44:55"): ScanObservation => ({
  ssid: "Library",
  bssid,
  rssi,
  frequency: 5200,
  capabilities: "[ESS]",
});

const scored = (badgeLevel: BadgeLevel): ScoredNetwork => ({
  networkKey: { ssid: '"Library"', bssid: "02:11:22:33:44:55" },
  curve: createConstantCurve(0),
  meteredHint: false,
  hasCaptivePortal: false,
  badgeLevel,
  badgeCurve: badgeCurveFor(badgeLevel),
});

describe("calculateSignalLevel", () => {
  it.each([
    [-120, 0],
    [-100, 0],
    [-78, 1],
    [-60, 3],
    [-55, 4],
    [-30, 4],
  ])("should map %i dBm to %i bars", (rssi, level) => {
    expect(calculateSignalLevel(rssi)).toBe(level);
  });
});

describe("NotificationContentBuilder", () => {
  const getCachedScoredNetwork = jest.fn<ScoredNetwork | undefined, [NetworkKey]>();
  const builder = new NotificationContentBuilder({ getCachedScoredNetwork });

  beforeEach(() => {
    getCachedScoredNetwork.mockReset();
    getCachedScoredNetwork.mockReturnValue(scored(BadgeLevel.SD));
  });

  describe("createBadge", () => {
    it("should combine signal bars with the cached badge", () => {
      expect(builder.createBadge(NETWORK, [scanAt(-78)])).toEqual({
        signalLevel: 1,
        badgeLevel: BadgeLevel.SD,
      });
      expect(getCachedScoredNetwork).toHaveBeenCalledWith({
        ssid: '"Library"',
        bssid: "02:11:22:33:44:55",
      });
    });

    it("should match the access point regardless of case", () => {
      expect(
        builder.createBadge(NETWORK, [scanAt(-60, "02:11:22:33:44:55".toUpperCase())]),
      ).toEqual({ signalLevel: 3, badgeLevel: BadgeLevel.SD });
    });

    it("should return null for a network without a BSSID", () => {
      const { bssid, ...withoutBssid } = NETWORK;
      expect(bssid).toBeDefined();
      expect(builder.createBadge(withoutBssid, [scanAt(-60)])).toBeNull();
    });

    it("should return null when the access point is not in the scan", () => {
      expect(
        builder.createBadge(NETWORK, [scanAt(-60, "02:99:99:99:99:99")]),
      ).toBeNull();
    });

    it("should return null without a cached score", () => {
      getCachedScoredNetwork.mockReturnValue(undefined);
      expect(builder.createBadge(NETWORK, [scanAt(-60)])).toBeNull();
    });

    it("should keep the signal bars when the score has no badge", () => {
      getCachedScoredNetwork.mockReturnValue(scored(BadgeLevel.NONE));
      expect(builder.createBadge(NETWORK, [scanAt(-50)])).toEqual({
        signalLevel: 4,
        badgeLevel: BadgeLevel.NONE,
      });
    });
  });

  describe("content", () => {
    const badge = { signalLevel: 2, badgeLevel: BadgeLevel.UHD_4K };

    it("should offer connect and options on the main notification", () => {
      expect(builder.createMain(NETWORK, badge)).toEqual({
        kind: "available",
        title: "Open Wi-Fi network available",
        text: "Library",
        badge,
        actions: ["connect", "options"],
        progress: false,
      });
    });

    it("should show progress while connecting", () => {
      expect(builder.createConnecting(NETWORK, badge)).toMatchObject({
        kind: "connecting",
        actions: [],
        progress: true,
      });
    });

    it("should keep the badge once connected", () => {
      expect(builder.createConnected(NETWORK, badge)).toMatchObject({
        kind: "connected",
        text: "Library",
        badge,
      });
    });

    it("should drop the network name and badge on failure", () => {
      expect(builder.createFailed()).toEqual({
        kind: "failed",
        title: "Open Wi-Fi network available",
        text: "Could not connect to network",
        badge: null,
        actions: [],
        progress: false,
      });
    });
  });
});
