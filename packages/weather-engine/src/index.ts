export * from "./adapters/index.js";
export * from "./cache/index.js";
export * from "./extract/index.js";
export { fetchJson, maskUrl, backoffDelayMs } from "./http/fetch-json.js";
export type { FetchJsonOptions } from "./http/fetch-json.js";
export { buildMockWeather, MOCK_SKY_CYCLE, MOCK_MAX_HOURLY_STEPS } from "./mock/weather.js";
export type { MockWeatherOptions } from "./mock/weather.js";
export { renderJson } from "./render/json.js";
export { renderText, weekdayText } from "./render/text.js";
export { buildReport } from "./report.js";
export type { Report, BuildReportInput } from "./report.js";
export { resolveConfig, effectiveHourlySteps, DEFAULT_DAYS } from "./config.js";
export type { WeatherConfig, ConfigInput, OutputFormat } from "./config.js";
export { runWeatherQuery, GEOCODE_CACHE_FILE, WEATHER_CACHE_FILE } from "./query.js";
export type { QueryDependencies, QueryResult } from "./query.js";
export { normalizePlace } from "./place.js";
export * from "./errors.js";
export * from "./logging.js";
export type { JsonValue, JsonObject } from "./json.js";
