/**
 * Service contracts. Everything the container wires together is typed by one
 * of these interfaces so tests can substitute in-process fakes.
 */

export * from "./IScoreStore";
export * from "./IScoreSink";
export * from "./IRadioController";
export * from "./INotifier";
export * from "./IRecommendationProvider";
export * from "./INetworkSelector";
export * from "./IEventQueue";
export * from "./IConfigService";
export * from "./IWebInterfaceService";
