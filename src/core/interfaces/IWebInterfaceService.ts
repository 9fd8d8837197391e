import { Result } from "@core/types";

/**
 * Web Interface Service Interface
 *
 * Serves the diagnostics HTTP API.
 */
export interface IWebInterfaceService {
  /**
   * Start listening on the configured host and port
   */
  start(): Promise<Result<void>>;

  /**
   * Stop the web server
   */
  stop(): Promise<Result<void>>;

  isRunning(): boolean;

  /**
   * Get the server URL
   * @returns Server URL (e.g., "http://localhost:3000")
   */
  getServerUrl(): string;

  getPort(): number;
}
