/**
 * Core types for the network recommendation service
 */
export * from "./ResultTypes";
export * from "./ConfigTypes";
export * from "./NetworkTypes";
export * from "./RadioTypes";
export * from "./NotificationTypes";
export * from "./WakeupTypes";
