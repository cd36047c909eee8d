export * from "./types.js";
export * from "./skycon.js";
export * from "./normalize.js";
export { extractRealtime } from "./realtime.js";
export { extractDailyForecast, extractHourlyForecast, HOURLY_LIMIT } from "./forecast.js";
export { extractAlerts, extractLifeIndex, extractMinutelySummary } from "./extras.js";
