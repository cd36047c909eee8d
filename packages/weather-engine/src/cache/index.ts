export * from "./types.js";
export * from "./file-cache.js";
export * from "./memory-cache.js";
export * from "./lease.js";
export * from "./read-through.js";
