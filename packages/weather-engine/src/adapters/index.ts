export * from "./types.js";
export * from "./geocode.js";
export * from "./weather.js";
