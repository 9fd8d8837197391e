import { Request, Response } from "express";
import { IEventQueue } from "@core/interfaces";
import { getLogger } from "@utils/logger";
import { RadioEventInput } from "@web/validation";

const logger = getLogger("EventController");

/**
 * Event Controller
 *
 * Injects radio events into the event queue, standing in for a radio
 * subsystem during diagnostics.
 */
export class EventController {
  constructor(private readonly queue: IEventQueue) {}

  /**
   * @route POST /events
   */
  async dispatchEvent(req: Request, res: Response): Promise<void> {
    const event: RadioEventInput = req.body;
    logger.info(`Injecting ${event.type}`);
    this.queue.dispatch(event);
    res.json({
      success: true,
      message: `Event ${event.type} dispatched`,
    });
  }
}
