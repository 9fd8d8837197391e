import { Request, Response } from "express";
import { IEventQueue, IRadioController } from "@core/interfaces";
import { NotificationStatus, WakeupStatus } from "@core/types";
import { RecommendationEngine } from "@services/recommendation/RecommendationEngine";
import { getLogger } from "@utils/logger";
import { ScoreController } from "./ScoreController";
import { EventController } from "./EventController";

const logger = getLogger("WebController");

type Inspectable<S> = {
  getStatus(): S;
  dump(): string[];
};

/**
 * Everything the diagnostics API reads from or drives
 */
export type WebServices = {
  engine: Pick<
    RecommendationEngine,
    "addScoreFromLine" | "onRequestScores" | "recommend" | "dump"
  >;
  queue: IEventQueue;
  radio: IRadioController;
  wakeup: Inspectable<WakeupStatus>;
  notification: Inspectable<NotificationStatus>;
};

/**
 * Web Controller
 *
 * Handles the core endpoints directly:
 * - Health check (`GET /health`)
 * - Service status (`GET /status`)
 * - Text dump of every component (`GET /dump`)
 *
 * Specialized endpoints are delegated to sub-controllers:
 * - {@link ScoreController} - scores and recommendations
 * - {@link EventController} - radio event injection
 */
export class WebController {
  public readonly scores: ScoreController;
  public readonly events: EventController;

  constructor(private readonly services: WebServices) {
    this.scores = new ScoreController(services.engine);
    this.events = new EventController(services.queue);
  }

  /**
   * @route GET /health
   */
  async getHealth(_req: Request, res: Response): Promise<void> {
    logger.debug("Health check requested");
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Radio state plus the status of both state machines
   *
   * @route GET /status
   */
  async getSystemStatus(_req: Request, res: Response): Promise<void> {
    logger.debug("System status requested");
    const { radio, wakeup, notification } = this.services;
    res.json({
      success: true,
      data: {
        radio: {
          wifiState: radio.getWifiState(),
          apState: radio.getApState(),
          settings: radio.getSettings(),
          configuredNetworks: radio.getConfiguredNetworks().length,
        },
        wakeup: wakeup.getStatus(),
        notification: notification.getStatus(),
      },
    });
  }

  /**
   * @route GET /dump
   */
  async getDump(_req: Request, res: Response): Promise<void> {
    const { engine, wakeup, notification } = this.services;
    res.json({
      success: true,
      data: [...engine.dump(), ...wakeup.dump(), ...notification.dump()],
    });
  }
}
