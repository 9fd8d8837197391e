import { Request, Response } from "express";
import { RecommendationEngine } from "@services/recommendation/RecommendationEngine";
import { NetworkKey, attempt, isSuccess } from "@core/types";
import { createNetworkKey } from "@utils/networkKey";
import { getLogger } from "@utils/logger";
import { extractErrorInfo } from "@utils/typeGuards";
import {
  AddScoreInput,
  RecommendationRequestInput,
  RequestScoresInput,
} from "@web/validation";

const logger = getLogger("ScoreController");

export type ScoreEngine = Pick<
  RecommendationEngine,
  "addScoreFromLine" | "onRequestScores" | "recommend"
>;

/**
 * Score Controller
 *
 * Score injection, score requests and recommendations. Bodies are validated
 * by the route middleware before they reach these handlers.
 */
export class ScoreController {
  constructor(private readonly engine: ScoreEngine) {}

  /**
   * Add one score line
   *
   * @route POST /scores
   */
  async addScore(req: Request, res: Response): Promise<void> {
    const body: AddScoreInput = req.body;
    const result = await this.engine.addScoreFromLine(body.line);

    if (isSuccess(result)) {
      res.json({ success: true, data: result.data });
    } else {
      logger.warn(`Score rejected: ${result.error.message}`);
      res.status(400).json({
        success: false,
        error: extractErrorInfo(result.error),
      });
    }
  }

  /**
   * Publish the stored scores for a batch of keys
   *
   * @route POST /scores/request
   */
  async requestScores(req: Request, res: Response): Promise<void> {
    const body: RequestScoresInput = req.body;
    const keys = attempt((): NetworkKey[] =>
      body.keys.map((key) => createNetworkKey(key.ssid, key.bssid)),
    );
    if (!isSuccess(keys)) {
      logger.warn(`Score request rejected: ${keys.error.message}`);
      res.status(400).json({
        success: false,
        error: extractErrorInfo(keys.error),
      });
      return;
    }

    const result = await this.engine.onRequestScores(keys.data);
    if (isSuccess(result)) {
      res.json({ success: true, data: result.data });
    } else {
      logger.error("Score request failed:", result.error);
      res.status(502).json({
        success: false,
        error: extractErrorInfo(result.error),
      });
    }
  }

  /**
   * Recommend a network among scans
   *
   * @route POST /recommendation
   */
  async recommend(req: Request, res: Response): Promise<void> {
    const body: RecommendationRequestInput = req.body;
    const result = this.engine.recommend({
      scans: body.scans,
      capabilityFilter: { requireTrusted: body.requireTrusted },
      currentConfig: body.currentConfig,
    });

    if (isSuccess(result)) {
      res.json({ success: true, data: result.data });
    } else {
      res.status(400).json({
        success: false,
        error: extractErrorInfo(result.error),
      });
    }
  }
}
