import { readThrough } from "../cache/read-through.js";
import { ConfigError, ResolutionError } from "../errors.js";
import { fetchJson } from "../http/fetch-json.js";
import { asArray, asNumber, asString, asText, isRecord } from "../json.js";
import type { JsonValue } from "../json.js";
import type { Logger } from "../logging.js";
import type { AdapterOptions, CacheBinding, GeoResult, Geocoder, HttpOptions } from "./types.js";

const DEFAULT_AMAP_BASE_URL = "https://restapi.amap.com/v3";

export const MOCK_COORDINATES = { lng: 116.397428, lat: 39.90923 } as const;

export interface AmapGeocoderOptions extends AdapterOptions {
  apiKey: string;
  http: HttpOptions;
  baseUrl?: string;
}

export const geocodeCacheKey = (namespace: CacheBinding["namespace"], place: string): string =>
  `${namespace}:amap:${place}`;

/**
 * Accepts a cached value only when it still carries usable coordinates.
 */
export const parseGeoResult = (value: JsonValue): GeoResult | null => {
  if (!isRecord(value)) return null;
  const lng = asNumber(value.lng);
  const lat = asNumber(value.lat);
  const queryPlace = asString(value.query_place);
  if (lng === null || lat === null || queryPlace === null) return null;
  return {
    query_place: queryPlace,
    resolved_address: asText(value.resolved_address) ?? queryPlace,
    lng,
    lat,
    province: asString(value.province),
    city: asString(value.city),
    district: asString(value.district),
    adcode: asString(value.adcode)
  };
};

/**
 * Parses AMap's "lng,lat" location string; anything but two finite numbers is rejected.
 */
export const parseLocation = (location: string): { lng: number; lat: number } | null => {
  const parts = location.split(",");
  if (parts.length !== 2) return null;
  const [lng, lat] = parts.map((part) => (part.trim() === "" ? Number.NaN : Number(part)));
  if (!Number.isFinite(lng) || !Number.isFinite(lat)) return null;
  return { lng, lat };
};

export class AmapGeocoder implements Geocoder {
  private readonly apiKey: string;
  private readonly http: HttpOptions;
  private readonly baseUrl: string;
  private readonly cache?: CacheBinding;
  private readonly logger?: Logger;

  constructor(options: AmapGeocoderOptions) {
    if (!options.apiKey) {
      throw new ConfigError("Missing AMap API key (set AMAP_API_KEY or pass --amap-key)");
    }
    this.apiKey = options.apiKey;
    this.http = options.http;
    this.baseUrl = options.baseUrl ?? DEFAULT_AMAP_BASE_URL;
    this.cache = options.cache;
    this.logger = options.logger;
  }

  /**
   * @param place - already normalized, see `normalizePlace`
   */
  async resolve(place: string): Promise<GeoResult> {
    return readThrough({
      cache: this.cache?.cache,
      key: geocodeCacheKey(this.cache?.namespace ?? "live", place),
      ttlSeconds: this.cache?.ttlSeconds ?? 0,
      parse: parseGeoResult,
      load: () => this.lookup(place),
      logger: this.logger,
      label: "geocode"
    });
  }

  private async lookup(place: string): Promise<GeoResult> {
    const data = await fetchJson(this.buildUrl(place), { ...this.http, logger: this.logger });
    if (!isRecord(data)) {
      throw new ResolutionError("Geocoding service returned a non-object response");
    }

    if (String(data.status) !== "1") {
      const reason = asText(data.info) ?? JSON.stringify(data);
      throw new ResolutionError(`Geocoding service returned failure: ${reason}`);
    }

    const first = asArray(data.geocodes)[0];
    if (first === undefined) {
      throw new ResolutionError(`No coordinates found for place: ${place}`);
    }
    const candidate = isRecord(first) ? first : {};
    const location = asString(candidate.location) ?? "";
    const coords = parseLocation(location);
    if (!coords) {
      throw new ResolutionError(`Malformed coordinates from geocoding service: ${location || "(empty)"}`);
    }

    return {
      query_place: place,
      resolved_address: asText(candidate.formatted_address) ?? place,
      lng: coords.lng,
      lat: coords.lat,
      province: asString(candidate.province),
      city: asString(candidate.city),
      district: asString(candidate.district),
      adcode: asString(candidate.adcode)
    };
  }

  private buildUrl(place: string): string {
    const url = new URL(`${this.baseUrl}/geocode/geo`);
    url.searchParams.set("address", place);
    url.searchParams.set("key", this.apiKey);
    return url.toString();
  }
}

/**
 * Offline stand-in: every place resolves to the same fixed point.
 */
export class MockGeocoder implements Geocoder {
  constructor(private readonly options: AdapterOptions = {}) {}

  async resolve(place: string): Promise<GeoResult> {
    const { cache, logger } = this.options;
    return readThrough({
      cache: cache?.cache,
      key: geocodeCacheKey(cache?.namespace ?? "mock", place),
      ttlSeconds: cache?.ttlSeconds ?? 0,
      parse: parseGeoResult,
      load: async () => ({
        query_place: place,
        resolved_address: place,
        lng: MOCK_COORDINATES.lng,
        lat: MOCK_COORDINATES.lat,
        province: null,
        city: null,
        district: null,
        adcode: null
      }),
      logger,
      label: "geocode"
    });
  }
}

export const createAmapGeocoder = (options: AmapGeocoderOptions): AmapGeocoder => new AmapGeocoder(options);
export const createMockGeocoder = (options?: AdapterOptions): MockGeocoder => new MockGeocoder(options);
