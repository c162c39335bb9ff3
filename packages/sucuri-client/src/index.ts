export * from "./errors.js";
export * from "./requests.js";
export * from "./client.js";
export * from "./batch.js";
