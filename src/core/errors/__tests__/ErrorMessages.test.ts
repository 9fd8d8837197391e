import {
  ERROR_MESSAGES,
  DEFAULT_ERROR_MESSAGES,
  SCORE_ERROR_MESSAGES,
  RADIO_ERROR_MESSAGES,
  getUserMessage,
} from "../ErrorMessages";
import { ScoreErrorCode } from "../ScoreError";
import { RecommendationErrorCode } from "../RecommendationError";
import { RadioErrorCode } from "../RadioError";
import { ConfigErrorCode } from "../ConfigError";
import { WebErrorCode } from "../WebError";

describe("ErrorMessages", () => {
  describe("ERROR_MESSAGES", () => {
    it.each([
      ["ScoreErrorCode", Object.values(ScoreErrorCode)],
      ["RecommendationErrorCode", Object.values(RecommendationErrorCode)],
      ["RadioErrorCode", Object.values(RadioErrorCode)],
      ["ConfigErrorCode", Object.values(ConfigErrorCode)],
      ["WebErrorCode", Object.values(WebErrorCode)],
    ])("should have a message for every %s", (_name, codes) => {
      codes.forEach((code) => {
        expect(ERROR_MESSAGES[code]).toBeDefined();
        expect(ERROR_MESSAGES[code].length).toBeGreaterThan(0);
      });
    });

    it("should have user-friendly score messages", () => {
      expect(SCORE_ERROR_MESSAGES["SCORE_INVALID_BADGE"]).toBe(
        "Unknown badge level. Use NONE, SD, HD or 4K.",
      );
      expect(RADIO_ERROR_MESSAGES["RADIO_AIRPLANE_MODE"]).toBe(
        "Airplane mode is on.",
      );
    });
  });

  describe("DEFAULT_ERROR_MESSAGES", () => {
    it("should have defaults for all error categories", () => {
      ["SCORE", "RECOMMENDATION", "RADIO", "WEB", "CONFIG"].forEach(
        (category) => {
          expect(typeof DEFAULT_ERROR_MESSAGES[category]).toBe("string");
        },
      );
    });
  });

  describe("getUserMessage", () => {
    it("should return the message for a known code", () => {
      expect(getUserMessage("SCORE_MALFORMED_LINE")).toBe(
        "Score line could not be parsed. Check the addScore format.",
      );
      expect(getUserMessage("WEB_PORT_IN_USE")).toBe(
        "Web interface port is already in use. Please change the port.",
      );
    });

    it("should return the category default for an unknown code", () => {
      expect(getUserMessage("RADIO_SOME_NEW_ERROR")).toBe(
        "Wi-Fi error occurred. Please try again.",
      );
      expect(getUserMessage("CONFIG_SOME_NEW_ERROR")).toBe(
        "Configuration error occurred. Using default settings.",
      );
    });

    it("should return the generic fallback otherwise", () => {
      expect(getUserMessage("COMPLETELY_UNKNOWN_CODE")).toBe(
        "An error occurred. Please try again.",
      );
      expect(getUserMessage("")).toBe("An error occurred. Please try again.");
    });
  });
});
