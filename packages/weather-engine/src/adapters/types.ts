import type { CacheProvider } from "../cache/types.js";
import type { JsonObject } from "../json.js";
import type { Logger } from "../logging.js";

export type DetailLevel = "basic" | "full";

/**
 * First geocoding candidate for a normalized place string. Declared as a type alias so that
 * it stays assignable to a cacheable JSON object.
 */
export type GeoResult = {
  query_place: string;
  resolved_address: string;
  lng: number;
  lat: number;
  province: string | null;
  city: string | null;
  district: string | null;
  adcode: string | null;
};

/**
 * Raw weather service response. Its shape depends on the detail level and on whether it
 * came from the live service or the mock generator.
 */
export type WeatherPayload = JsonObject;

export interface WeatherRequest {
  lng: number;
  lat: number;
  days: number;
  detail: DetailLevel;
  hourlySteps: number;
}

export interface Geocoder {
  resolve(place: string): Promise<GeoResult>;
}

export interface WeatherSource {
  fetch(request: WeatherRequest): Promise<WeatherPayload>;
}

export interface HttpOptions {
  timeoutMs: number;
  retries: number;
  fetchImpl?: typeof fetch;
  delay?: (ms: number) => Promise<void>;
}

export interface CacheBinding {
  cache: CacheProvider;
  ttlSeconds: number;
  /**
   * Key prefix separating mock data from live data.
   */
  namespace: "mock" | "live";
}

export interface AdapterOptions {
  cache?: CacheBinding;
  logger?: Logger;
}
