import express, { Express, NextFunction, Request, Response } from "express";
import http from "http";
import { Result, success, failure, WebConfig } from "@core/types";
import { IWebInterfaceService } from "@core/interfaces";
import { WebError } from "@core/errors";
import { WEB_MAX_BODY_SIZE } from "@core/constants";
import { getLogger } from "@utils/logger";
import { isNodeJSErrnoException, toError } from "@utils/typeGuards";
import {
  validateBody,
  addScoreSchema,
  requestScoresSchema,
  recommendationRequestSchema,
  radioEventSchema,
} from "@web/validation";
import { WebController, WebServices } from "./controllers/WebController";

const logger = getLogger("IntegratedWebService");

/**
 * Integrated Web Interface Service
 *
 * Express app for the diagnostics API, wired to the recommendation engine,
 * the event queue and both state machines through {@link WebController}.
 */
export class IntegratedWebService implements IWebInterfaceService {
  private app: Express;
  private server: http.Server | null = null;
  private running: boolean = false;
  private controller: WebController;

  constructor(
    services: WebServices,
    private readonly config: WebConfig,
  ) {
    this.app = express();
    this.controller = new WebController(services);
    this.setupMiddleware();
    this.setupRoutes();
  }

  /**
   * Start the web server
   */
  async start(): Promise<Result<void>> {
    if (this.running) {
      return success(undefined);
    }

    const server = http.createServer(this.app);
    try {
      await new Promise<void>((resolve, reject) => {
        server
          .listen(this.config.port, this.config.host, () => {
            resolve();
          })
          .on("error", (err: Error) => {
            if (isNodeJSErrnoException(err) && err.code === "EADDRINUSE") {
              reject(WebError.portInUse(this.config.port));
            } else {
              reject(err);
            }
          });
      });
    } catch (error) {
      if (error instanceof WebError) {
        return failure(error);
      }
      return failure(
        WebError.serverStartFailed(this.config.port, toError(error)),
      );
    }

    this.server = server;
    this.running = true;
    logger.info(`✓ Diagnostics API started on ${this.getServerUrl()}`);
    return success(undefined);
  }

  /**
   * Stop the web server
   */
  async stop(): Promise<Result<void>> {
    const server = this.server;
    if (!this.running || !server) {
      return failure(WebError.serverNotRunning());
    }

    try {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    } catch (error) {
      return failure(WebError.serverStopFailed(toError(error)));
    }

    this.server = null;
    this.running = false;
    logger.info("✓ Diagnostics API stopped");
    return success(undefined);
  }

  isRunning(): boolean {
    return this.running;
  }

  getServerUrl(): string {
    const host =
      this.config.host === "0.0.0.0" ? "localhost" : this.config.host;
    return `http://${host}:${this.config.port}`;
  }

  getPort(): number {
    return this.config.port;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: WEB_MAX_BODY_SIZE }));

    this.app.use((req, _res, next) => {
      logger.info(`${req.method} ${req.path}`);
      next();
    });
  }

  private setupRoutes(): void {
    const api = this.config.apiBasePath;

    this.app.get(`${api}/health`, (req, res) =>
      this.controller.getHealth(req, res),
    );

    this.app.get(`${api}/status`, (req, res) =>
      this.controller.getSystemStatus(req, res),
    );

    this.app.get(`${api}/dump`, (req, res) =>
      this.controller.getDump(req, res),
    );

    // Score endpoints
    this.app.post(`${api}/scores`, validateBody(addScoreSchema), (req, res) =>
      this.controller.scores.addScore(req, res),
    );

    this.app.post(
      `${api}/scores/request`,
      validateBody(requestScoresSchema),
      (req, res) => this.controller.scores.requestScores(req, res),
    );

    this.app.post(
      `${api}/recommendation`,
      validateBody(recommendationRequestSchema),
      (req, res) => this.controller.scores.recommend(req, res),
    );

    // Event injection
    this.app.post(`${api}/events`, validateBody(radioEventSchema), (req, res) =>
      this.controller.events.dispatchEvent(req, res),
    );

    // 404 handler
    this.app.use((req, res) => {
      const error = WebError.notFound(`${req.method} ${req.path}`);
      res.status(error.statusCode ?? 404).json({
        success: false,
        error: { code: error.code, message: error.message },
      });
    });

    // Error handler
    this.app.use(
      (err: Error, _req: Request, res: Response, _next: NextFunction) => {
        logger.error("Express error:", err);
        res.status(500).json({
          success: false,
          error: {
            code: "INTERNAL_ERROR",
            message: "Internal server error",
          },
        });
      },
    );
  }
}
