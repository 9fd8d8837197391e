import { Request, Response } from "express";
import { ScoreController, ScoreEngine } from "../ScoreController";
import { BadgeLevel, ScoredNetwork, failure, success } from "@core/types";
import { ScoreError } from "@core/errors";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const CAFE_SCORE: ScoredNetwork = {
  networkKey: { ssid: '"Cafe"', bssid: "aa:bb:cc:dd:ee:ff" },
  curve: { start: -150, bucketWidth: 10, buckets: [20] },
  meteredHint: false,
  hasCaptivePortal: false,
  badgeLevel: BadgeLevel.NONE,
};

describe("ScoreController", () => {
  let controller: ScoreController;
  let mockEngine: jest.Mocked<ScoreEngine>;
  let mockRequest: Partial<Request>;
  let mockResponse: Partial<Response>;
  let jsonMock: jest.Mock;
  let statusMock: jest.Mock;

  beforeEach(() => {
    jsonMock = jest.fn();
    statusMock = jest.fn().mockReturnThis();
    mockResponse = { json: jsonMock, status: statusMock };
    mockRequest = {};

    mockEngine = {
      addScoreFromLine: jest.fn(),
      onRequestScores: jest.fn(),
      recommend: jest.fn(),
    };

    controller = new ScoreController(mockEngine);
  });

  describe("addScore", () => {
    it("should return the stored score", async () => {
      mockEngine.addScoreFromLine.mockResolvedValue(success(CAFE_SCORE));
      mockRequest.body = { line: '"Cafe",aa:bb:cc:dd:ee:ff|10,20|0|0|NONE' };

      await controller.addScore(
        mockRequest as Request,
        mockResponse as Response,
      );

      expect(mockEngine.addScoreFromLine).toHaveBeenCalledWith(
        '"Cafe",aa:bb:cc:dd:ee:ff|10,20|0|0|NONE',
      );
      expect(statusMock).not.toHaveBeenCalled();
      expect(jsonMock).toHaveBeenCalledWith({ success: true, data: CAFE_SCORE });
    });

    it("should return 400 for a malformed line", async () => {
      mockEngine.addScoreFromLine.mockResolvedValue(
        failure(ScoreError.malformedLine("bad", "expected 5 fields, got 1")),
      );
      mockRequest.body = { line: "bad" };

      await controller.addScore(
        mockRequest as Request,
        mockResponse as Response,
      );

      expect(statusMock).toHaveBeenCalledWith(400);
      expect(jsonMock).toHaveBeenCalledWith({
        success: false,
        error: {
          code: "SCORE_MALFORMED_LINE",
          message: "Score line could not be parsed. Check the addScore format.",
        },
      });
    });
  });

  describe("requestScores", () => {
    it("should pass validated keys to the engine", async () => {
      mockEngine.onRequestScores.mockResolvedValue(success([CAFE_SCORE]));
      mockRequest.body = {
        keys: [{ ssid: '"Cafe"', bssid: "AA:BB:CC:DD:EE:FF" }],
      };

      await controller.requestScores(
        mockRequest as Request,
        mockResponse as Response,
      );

      expect(mockEngine.onRequestScores).toHaveBeenCalledWith([
        { ssid: '"Cafe"', bssid: "aa:bb:cc:dd:ee:ff" },
      ]);
      expect(jsonMock).toHaveBeenCalledWith({
        success: true,
        data: [CAFE_SCORE],
      });
    });

    it("should reject an unquoted SSID without asking the engine", async () => {
      mockRequest.body = {
        keys: [{ ssid: "Cafe", bssid: "aa:bb:cc:dd:ee:ff" }],
      };

      await controller.requestScores(
        mockRequest as Request,
        mockResponse as Response,
      );

      expect(mockEngine.onRequestScores).not.toHaveBeenCalled();
      expect(statusMock).toHaveBeenCalledWith(400);
      expect(jsonMock).toHaveBeenCalledWith({
        success: false,
        error: {
          code: "SCORE_INVALID_ARGUMENT",
          message:
            "Invalid network key. SSIDs must be quoted or hex, BSSIDs colon-separated.",
        },
      });
    });

    it("should return 502 when publishing fails", async () => {
      mockEngine.onRequestScores.mockResolvedValue(
        failure(ScoreError.publishFailed(1, new Error("sink offline"))),
      );
      mockRequest.body = {
        keys: [{ ssid: '"Cafe"', bssid: "aa:bb:cc:dd:ee:ff" }],
      };

      await controller.requestScores(
        mockRequest as Request,
        mockResponse as Response,
      );

      expect(statusMock).toHaveBeenCalledWith(502);
      expect(jsonMock).toHaveBeenCalledWith({
        success: false,
        error: {
          code: "SCORE_PUBLISH_FAILED",
          message: "Scores could not be published. They remain stored.",
        },
      });
    });
  });

  describe("recommend", () => {
    const scan = {
      ssid: "Cafe",
      bssid: "aa:bb:cc:dd:ee:ff",
      rssi: -60,
      frequency: 2437,
      capabilities: "[ESS]",
    };

    it("should build the request from the body", async () => {
      mockEngine.recommend.mockReturnValue(success({ connect: null }));
      mockRequest.body = { scans: [scan], requireTrusted: true };

      await controller.recommend(
        mockRequest as Request,
        mockResponse as Response,
      );

      expect(mockEngine.recommend).toHaveBeenCalledWith({
        scans: [scan],
        capabilityFilter: { requireTrusted: true },
        currentConfig: undefined,
      });
      expect(jsonMock).toHaveBeenCalledWith({
        success: true,
        data: { connect: null },
      });
    });

    it("should return 400 when the engine rejects a scan", async () => {
      mockEngine.recommend.mockReturnValue(
        failure(ScoreError.invalidArgument("bssid", "nope")),
      );
      mockRequest.body = { scans: [scan], requireTrusted: false };

      await controller.recommend(
        mockRequest as Request,
        mockResponse as Response,
      );

      expect(statusMock).toHaveBeenCalledWith(400);
      expect(jsonMock).toHaveBeenCalledWith({
        success: false,
        error: expect.objectContaining({ code: "SCORE_INVALID_ARGUMENT" }),
      });
    });
  });
});
