import { readThrough } from "../cache/read-through.js";
import { ConfigError, UpstreamError } from "../errors.js";
import { fetchJson } from "../http/fetch-json.js";
import { asText, isRecord } from "../json.js";
import type { JsonValue } from "../json.js";
import type { Logger } from "../logging.js";
import { buildMockWeather } from "../mock/weather.js";
import type {
  AdapterOptions,
  CacheBinding,
  HttpOptions,
  WeatherPayload,
  WeatherRequest,
  WeatherSource
} from "./types.js";

const DEFAULT_CAIYUN_BASE_URL = "https://api.caiyunapp.com/v2.6";

export interface CaiyunWeatherSourceOptions extends AdapterOptions {
  token?: string;
  http: HttpOptions;
  baseUrl?: string;
}

export interface MockWeatherSourceOptions extends AdapterOptions {
  now?: () => Date;
}

/**
 * Every parameter that changes the upstream response is part of the key.
 */
export const weatherCacheKey = (namespace: CacheBinding["namespace"], request: WeatherRequest): string =>
  [
    `${namespace}:caiyun:${request.lng.toFixed(6)},${request.lat.toFixed(6)}`,
    `d${request.days}`,
    `detail${request.detail}`,
    `h${request.hourlySteps}`
  ].join(":");

const parsePayload = (value: JsonValue): WeatherPayload | null => (isRecord(value) ? value : null);

export class CaiyunWeatherSource implements WeatherSource {
  private readonly token?: string;
  private readonly http: HttpOptions;
  private readonly baseUrl: string;
  private readonly cache?: CacheBinding;
  private readonly logger?: Logger;

  constructor(options: CaiyunWeatherSourceOptions) {
    this.token = options.token;
    this.http = options.http;
    this.baseUrl = options.baseUrl ?? DEFAULT_CAIYUN_BASE_URL;
    this.cache = options.cache;
    this.logger = options.logger;
  }

  async fetch(request: WeatherRequest): Promise<WeatherPayload> {
    const token = this.token;
    if (!token) {
      throw new ConfigError("Missing Caiyun API token (set CAIYUN_API_TOKEN or pass --caiyun-token)");
    }
    return readThrough({
      cache: this.cache?.cache,
      key: weatherCacheKey(this.cache?.namespace ?? "live", request),
      ttlSeconds: this.cache?.ttlSeconds ?? 0,
      parse: parsePayload,
      load: () => this.request(token, request),
      logger: this.logger,
      label: "weather"
    });
  }

  private async request(token: string, request: WeatherRequest): Promise<WeatherPayload> {
    const data = await fetchJson(this.buildUrl(token, request), { ...this.http, logger: this.logger });
    if (!isRecord(data)) {
      throw new UpstreamError("invalid", "response is not a JSON object");
    }
    if (data.status !== "ok") {
      throw new UpstreamError(String(data.status ?? "unknown"), asText(data.error) ?? undefined);
    }
    return data;
  }

  private buildUrl(token: string, request: WeatherRequest): string {
    const url = new URL(`${this.baseUrl}/${encodeURIComponent(token)}/${request.lng},${request.lat}/weather.json`);
    url.searchParams.set("dailysteps", request.days.toString());
    url.searchParams.set("alert", "true");
    url.searchParams.set("hourlysteps", request.hourlySteps.toString());
    return url.toString();
  }
}

/**
 * Serves generated fixture data instead of calling the weather service.
 */
export class MockWeatherSource implements WeatherSource {
  constructor(private readonly options: MockWeatherSourceOptions = {}) {}

  async fetch(request: WeatherRequest): Promise<WeatherPayload> {
    const { cache, logger, now } = this.options;
    return readThrough({
      cache: cache?.cache,
      key: weatherCacheKey(cache?.namespace ?? "mock", request),
      ttlSeconds: cache?.ttlSeconds ?? 0,
      parse: parsePayload,
      load: async () => buildMockWeather({ ...request, now: now?.() }),
      logger,
      label: "weather"
    });
  }
}

export const createCaiyunWeatherSource = (options: CaiyunWeatherSourceOptions): CaiyunWeatherSource =>
  new CaiyunWeatherSource(options);
export const createMockWeatherSource = (options?: MockWeatherSourceOptions): MockWeatherSource =>
  new MockWeatherSource(options);
