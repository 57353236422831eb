export { generateFeed, getLatestFeed, resetFeeder } from "./feeder.js";
export type { FeederConfig, FeederResult } from "./types.js";
