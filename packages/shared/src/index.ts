export * from "./instruments";
export * from "./schemas/app-config";
export * from "./schemas/bot-state";
export * from "./schemas/market";
