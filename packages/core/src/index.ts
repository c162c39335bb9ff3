export * from "./types.js";
export * from "./cidr.js";
export * from "./changes.js";
export * from "./settings.js";
