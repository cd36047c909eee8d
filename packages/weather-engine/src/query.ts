import path from "path";
import { createAmapGeocoder, createMockGeocoder } from "./adapters/geocode.js";
import { createCaiyunWeatherSource, createMockWeatherSource } from "./adapters/weather.js";
import type { CacheBinding, Geocoder, HttpOptions, WeatherSource } from "./adapters/types.js";
import { createFileCache } from "./cache/file-cache.js";
import type { Clock } from "./cache/types.js";
import { effectiveHourlySteps } from "./config.js";
import type { WeatherConfig } from "./config.js";
import { silentLogger } from "./logging.js";
import type { Logger } from "./logging.js";
import { renderJson } from "./render/json.js";
import { renderText } from "./render/text.js";
import { buildReport } from "./report.js";
import type { Report } from "./report.js";

export const GEOCODE_CACHE_FILE = "geocode.json";
export const WEATHER_CACHE_FILE = "weather.json";

export interface QueryDependencies {
  logger?: Logger;
  fetchImpl?: typeof fetch;
  delay?: (ms: number) => Promise<void>;
  /** Milliseconds since epoch; drives cache timestamps, mock dates and `query_time`. */
  now?: Clock;
}

export interface QueryResult {
  report: Report;
  output: string;
}

interface Pipeline {
  geocoder: Geocoder;
  weather: WeatherSource;
}

function createPipeline(config: WeatherConfig, deps: QueryDependencies, logger: Logger): Pipeline {
  const namespace: CacheBinding["namespace"] = config.mock ? "mock" : "live";
  const geocodeCache = createFileCache({ filePath: path.join(config.cacheDir, GEOCODE_CACHE_FILE), now: deps.now });
  const weatherCache = createFileCache({ filePath: path.join(config.cacheDir, WEATHER_CACHE_FILE), now: deps.now });
  const geoBinding: CacheBinding = { cache: geocodeCache, ttlSeconds: config.geoTtlSeconds, namespace };
  const weatherBinding: CacheBinding = { cache: weatherCache, ttlSeconds: config.weatherTtlSeconds, namespace };

  if (config.mock) {
    const now = deps.now;
    return {
      geocoder: createMockGeocoder({ cache: geoBinding, logger }),
      weather: createMockWeatherSource({
        cache: weatherBinding,
        logger,
        now: now ? () => new Date(now()) : undefined
      })
    };
  }

  const http: HttpOptions = {
    timeoutMs: config.timeoutMs,
    retries: config.retries,
    fetchImpl: deps.fetchImpl,
    delay: deps.delay
  };
  return {
    geocoder: createAmapGeocoder({ apiKey: config.amapKey ?? "", http, cache: geoBinding, logger }),
    weather: createCaiyunWeatherSource({ token: config.caiyunToken, http, cache: weatherBinding, logger })
  };
}

/**
 * place → coordinates → weather payload → report → rendered output.
 */
export async function runWeatherQuery(config: WeatherConfig, deps: QueryDependencies = {}): Promise<QueryResult> {
  const logger = deps.logger ?? silentLogger;
  const { geocoder, weather } = createPipeline(config, deps, logger);

  const geo = await geocoder.resolve(config.place);
  const payload = await weather.fetch({
    lng: geo.lng,
    lat: geo.lat,
    days: config.days,
    detail: config.detail,
    hourlySteps: effectiveHourlySteps(config)
  });

  const report = buildReport({
    place: config.place,
    days: config.days,
    detail: config.detail,
    geo,
    weather: payload,
    includeRaw: config.includeRaw,
    now: deps.now ? new Date(deps.now()) : undefined
  });

  const output = config.format === "json" ? renderJson(report) : renderText(report, config.detail);
  return { report, output };
}
