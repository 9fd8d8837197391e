import {
  IConfigService,
  IEventQueue,
  INetworkSelector,
  INotifier,
  IRadioController,
  IScoreSink,
  IScoreStore,
} from "@core/interfaces";
import { WebConfig } from "@core/types";
import { ConfigService } from "@services/config/ConfigService";
import { EventQueue } from "@services/events/EventQueue";
import { ScoreStore } from "@services/score/ScoreStore";
import { LoggingScoreSink } from "@services/score/LoggingScoreSink";
import { NetworkSelector } from "@services/selector/NetworkSelector";
import { RecommendationEngine } from "@services/recommendation/RecommendationEngine";
import { MockRadioController } from "@services/radio/MockRadioController";
import { WakeupStateMachine } from "@services/wakeup/WakeupStateMachine";
import { LoggingNotifier } from "@services/notification/LoggingNotifier";
import { NotificationContentBuilder } from "@services/notification/NotificationContentBuilder";
import { NotificationStateMachine } from "@services/notification/NotificationStateMachine";
import { IntegratedWebService } from "@web/IntegratedWebService";
import { getLogger } from "@utils/logger";

const logger = getLogger("ServiceContainer");

/**
 * Service Container (Dependency Injection Container)
 *
 * Singleton that builds each service on first use from the configuration.
 * Tests replace collaborators through the setters before the services that
 * depend on them are first requested.
 */
export class ServiceContainer {
  private static instance: ServiceContainer;

  private services: {
    config?: IConfigService;
    eventQueue?: IEventQueue;
    scoreStore?: IScoreStore;
    scoreSink?: IScoreSink;
    radio?: IRadioController;
    selector?: INetworkSelector;
    notifier?: INotifier;
    recommendationEngine?: RecommendationEngine;
    wakeup?: WakeupStateMachine;
    notification?: NotificationStateMachine;
    web?: IntegratedWebService;
  } = {};

  private constructor() {}

  static getInstance(): ServiceContainer {
    if (!ServiceContainer.instance) {
      ServiceContainer.instance = new ServiceContainer();
    }
    return ServiceContainer.instance;
  }

  /**
   * Drop every service (useful for testing)
   */
  static reset(): void {
    if (ServiceContainer.instance) {
      ServiceContainer.instance.dispose();
      ServiceContainer.instance.services = {};
    }
  }

  getConfigService(): IConfigService {
    if (!this.services.config) {
      this.services.config = new ConfigService();
    }
    return this.services.config;
  }

  getWebConfig(): WebConfig {
    return this.getConfigService().getWebConfig();
  }

  getEventQueue(): IEventQueue {
    if (!this.services.eventQueue) {
      this.services.eventQueue = new EventQueue();
    }
    return this.services.eventQueue;
  }

  getScoreStore(): IScoreStore {
    if (!this.services.scoreStore) {
      this.services.scoreStore = new ScoreStore();
    }
    return this.services.scoreStore;
  }

  getScoreSink(): IScoreSink {
    if (!this.services.scoreSink) {
      this.services.scoreSink = new LoggingScoreSink();
    }
    return this.services.scoreSink;
  }

  /**
   * Radio controller. The standalone build only has the in-memory one, seeded
   * from the feature switches in the configuration.
   */
  getRadioController(): IRadioController {
    if (!this.services.radio) {
      const config = this.getConfigService().getConfig();
      const radio = new MockRadioController(this.getEventQueue(), {
        settings: {
          wakeupEnabled: config.wakeup.enabled,
          airplaneModeEnabled: false,
          notificationEnabled: config.notification.enabled,
        },
      });
      radio.start();
      this.services.radio = radio;
    }
    return this.services.radio;
  }

  getNetworkSelector(): INetworkSelector {
    if (!this.services.selector) {
      this.services.selector = new NetworkSelector(
        this.getConfigService().getSelectorConfig(),
      );
    }
    return this.services.selector;
  }

  getNotifier(): INotifier {
    if (!this.services.notifier) {
      this.services.notifier = new LoggingNotifier();
    }
    return this.services.notifier;
  }

  getRecommendationEngine(): RecommendationEngine {
    if (!this.services.recommendationEngine) {
      this.services.recommendationEngine = new RecommendationEngine(
        this.getScoreStore(),
        this.getScoreSink(),
        this.getRadioController(),
      );
    }
    return this.services.recommendationEngine;
  }

  getWakeupStateMachine(): WakeupStateMachine {
    if (!this.services.wakeup) {
      this.services.wakeup = new WakeupStateMachine(
        this.getEventQueue(),
        this.getRadioController(),
        this.getNetworkSelector(),
        this.getConfigService().getWakeupConfig(),
      );
    }
    return this.services.wakeup;
  }

  getNotificationStateMachine(): NotificationStateMachine {
    if (!this.services.notification) {
      const engine = this.getRecommendationEngine();
      this.services.notification = new NotificationStateMachine(
        this.getEventQueue(),
        this.getRadioController(),
        engine,
        this.getNotifier(),
        new NotificationContentBuilder(engine),
        this.getConfigService().getNotificationConfig(),
      );
    }
    return this.services.notification;
  }

  /**
   * Diagnostics API over the engine, the queue and both state machines
   */
  getWebService(): IntegratedWebService {
    if (!this.services.web) {
      this.services.web = new IntegratedWebService(
        {
          engine: this.getRecommendationEngine(),
          queue: this.getEventQueue(),
          radio: this.getRadioController(),
          wakeup: this.getWakeupStateMachine(),
          notification: this.getNotificationStateMachine(),
        },
        this.getWebConfig(),
      );
    }
    return this.services.web;
  }

  /**
   * Start both state machines on the event queue
   */
  startStateMachines(): void {
    this.getWakeupStateMachine().start();
    this.getNotificationStateMachine().start();
    logger.info("State machines started");
  }

  /**
   * Stop the state machines and drop queued work and timers
   */
  dispose(): void {
    this.services.wakeup?.stop();
    this.services.notification?.stop();
    this.services.eventQueue?.dispose();
  }

  // Test setters (for dependency injection in tests)

  setConfigService(service: IConfigService): void {
    this.services.config = service;
  }

  setEventQueue(queue: IEventQueue): void {
    this.services.eventQueue = queue;
  }

  setScoreStore(store: IScoreStore): void {
    this.services.scoreStore = store;
  }

  setScoreSink(sink: IScoreSink): void {
    this.services.scoreSink = sink;
  }

  setRadioController(radio: IRadioController): void {
    this.services.radio = radio;
  }

  setNetworkSelector(selector: INetworkSelector): void {
    this.services.selector = selector;
  }

  setNotifier(notifier: INotifier): void {
    this.services.notifier = notifier;
  }
}
