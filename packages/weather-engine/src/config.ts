import type { DetailLevel } from "./adapters/types.js";
import { ConfigError } from "./errors.js";
import { normalizePlace } from "./place.js";

export type OutputFormat = "text" | "json";

export const DEFAULT_DAYS = 7;
export const MAX_DAYS = 15;
export const MAX_HOURLY_STEPS = 360;
export const BASIC_HOURLY_STEPS = 6;

/**
 * Assembled once at startup and passed to every component; nothing downstream reads the
 * process environment.
 */
export interface WeatherConfig {
  /** Normalized place string. */
  place: string;
  cacheDir: string;
  geoTtlSeconds: number;
  weatherTtlSeconds: number;
  timeoutMs: number;
  retries: number;
  amapKey?: string;
  caiyunToken?: string;
  detail: DetailLevel;
  format: OutputFormat;
  days: number;
  /** Requested hourly steps, within 1-360. */
  hourlySteps: number;
  includeRaw: boolean;
  mock: boolean;
  debug: boolean;
}

/**
 * Raw option values, as strings straight from the command line where they came from there.
 */
export interface ConfigInput {
  place?: string;
  cacheDir?: string;
  geoTtlHours?: string | number;
  weatherTtlMinutes?: string | number;
  timeoutSeconds?: string | number;
  retries?: string | number;
  amapKey?: string;
  caiyunToken?: string;
  detail?: string;
  format?: string;
  days?: string | number;
  hourlySteps?: string | number;
  includeRaw?: boolean;
  mock?: boolean;
  debug?: boolean;
}

export type EnvSource = Readonly<Record<string, string | undefined>>;

const DEFAULTS = {
  cacheDir: "cache",
  geoTtlHours: 24 * 30,
  weatherTtlMinutes: 10,
  timeoutSeconds: 8,
  retries: 2,
  hourlySteps: 24
} as const;

const toNumber = (name: string, value: string | number | undefined, fallback: number): number => {
  if (value === undefined || value === "") return fallback;
  const parsed = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return parsed;
};

const toInteger = (name: string, value: string | number | undefined, fallback: number): number => {
  const parsed = toNumber(name, value, fallback);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
};

const requireRange = (name: string, value: number, min: number, max = Number.POSITIVE_INFINITY): number => {
  if (value < min || value > max) {
    const range = Number.isFinite(max) ? `${min}~${max}` : `>= ${min}`;
    throw new ConfigError(`${name} must be ${range}, got ${value}`);
  }
  return value;
};

const pickChoice = <T extends string>(name: string, value: string | undefined, choices: readonly T[], fallback: T): T => {
  if (value === undefined) return fallback;
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${choices.join("|")}, got "${value}"`);
  }
  return match;
};

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Validates and fills in defaults. Credentials come from the input first, then from `env`
 * (`AMAP_API_KEY`, `CAIYUN_API_TOKEN`).
 */
export function resolveConfig(input: ConfigInput, env: EnvSource = {}): WeatherConfig {
  const place = normalizePlace(input.place ?? "");
  if (!place) {
    throw new ConfigError("place must not be empty");
  }

  const days = requireRange("days", toInteger("days", input.days, DEFAULT_DAYS), 1, MAX_DAYS);
  const hourlySteps = requireRange(
    "hourly-steps",
    toInteger("hourly-steps", input.hourlySteps, DEFAULTS.hourlySteps),
    1,
    MAX_HOURLY_STEPS
  );
  const geoTtlHours = requireRange("geo-ttl-hours", toInteger("geo-ttl-hours", input.geoTtlHours, DEFAULTS.geoTtlHours), 0);
  const weatherTtlMinutes = requireRange(
    "weather-ttl-minutes",
    toInteger("weather-ttl-minutes", input.weatherTtlMinutes, DEFAULTS.weatherTtlMinutes),
    0
  );
  const timeoutSeconds = toNumber("timeout", input.timeoutSeconds, DEFAULTS.timeoutSeconds);
  if (timeoutSeconds <= 0) {
    throw new ConfigError(`timeout must be > 0 seconds, got ${timeoutSeconds}`);
  }
  const retries = requireRange("retries", toInteger("retries", input.retries, DEFAULTS.retries), 0);

  const detail = pickChoice<DetailLevel>("detail", input.detail, ["basic", "full"], "basic");
  const format = pickChoice<OutputFormat>("format", input.format, ["text", "json"], "text");

  const mock = input.mock ?? false;
  const amapKey = nonEmpty(input.amapKey) ?? nonEmpty(env.AMAP_API_KEY);
  const caiyunToken = nonEmpty(input.caiyunToken) ?? nonEmpty(env.CAIYUN_API_TOKEN);
  if (!mock && !amapKey) {
    throw new ConfigError("Missing AMap API key: set AMAP_API_KEY or pass --amap-key");
  }
  if (!mock && !caiyunToken) {
    throw new ConfigError("Missing Caiyun API token: set CAIYUN_API_TOKEN or pass --caiyun-token");
  }

  return {
    place,
    cacheDir: nonEmpty(input.cacheDir) ?? DEFAULTS.cacheDir,
    geoTtlSeconds: geoTtlHours * 3600,
    weatherTtlSeconds: weatherTtlMinutes * 60,
    timeoutMs: Math.round(timeoutSeconds * 1000),
    retries,
    amapKey,
    caiyunToken,
    detail,
    format,
    days,
    hourlySteps,
    includeRaw: input.includeRaw ?? false,
    mock,
    debug: input.debug ?? false
  };
}

/**
 * Hourly steps actually requested upstream: basic output never shows more than six hours.
 */
export const effectiveHourlySteps = (config: Pick<WeatherConfig, "detail" | "hourlySteps">): number =>
  config.detail === "full" ? config.hourlySteps : BASIC_HOURLY_STEPS;
