export * from "./crawlRunner";
export * from "./statusTracker";
