export * from "./metricsSchema";
export * from "./signals";
export * from "./report";
export * from "./preview";
