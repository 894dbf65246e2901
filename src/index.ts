export * from "./bitcoin";
export * from "./buffer";
export * from "./bytes";
export * from "./binary";
export * from "./hashes";
export * from "./logger";
export * from "./config/engine-config";
export * from "./script";
export * from "./transaction";
