import type { DetailLevel, GeoResult, WeatherPayload } from "./adapters/types.js";
import {
  HOURLY_LIMIT,
  extractAlerts,
  extractDailyForecast,
  extractHourlyForecast,
  extractLifeIndex,
  extractMinutelySummary,
  extractRealtime
} from "./extract/index.js";
import type {
  DailyForecast,
  HourlyForecast,
  LifeIndexSummary,
  MinutelySummary,
  RealtimeSummary,
  WeatherAlert
} from "./extract/index.js";
import { formatLocalDateTime } from "./time.js";

/**
 * Output schema. Built fresh on every run and never cached; the JSON rendering serializes it
 * as is, hence the snake_case field names.
 */
export interface Report {
  /** Local time, `YYYY-MM-DD HH:mm:ss`. */
  query_time: string;
  place: string;
  resolved_address: string;
  coord: { lng: number; lat: number };
  days: number;
  realtime: RealtimeSummary;
  daily: DailyForecast[];
  hourly?: HourlyForecast[];
  minutely?: MinutelySummary;
  alerts?: WeatherAlert[];
  life_index?: LifeIndexSummary;
  raw?: WeatherPayload;
}

export interface BuildReportInput {
  place: string;
  days: number;
  detail: DetailLevel;
  geo: GeoResult;
  weather: WeatherPayload;
  includeRaw?: boolean;
  now?: Date;
}

export function buildReport(input: BuildReportInput): Report {
  const { place, days, detail, geo, weather } = input;
  const report: Report = {
    query_time: formatLocalDateTime(input.now ?? new Date()),
    place,
    resolved_address: geo.resolved_address || place,
    coord: { lng: geo.lng, lat: geo.lat },
    days,
    realtime: extractRealtime(weather),
    daily: extractDailyForecast(weather, Math.max(days, 1))
  };

  const hourly = extractHourlyForecast(weather, HOURLY_LIMIT[detail]);
  if (hourly.length > 0) {
    report.hourly = hourly;
  }

  if (detail === "full") {
    report.minutely = extractMinutelySummary(weather);
    const alerts = extractAlerts(weather);
    if (alerts.length > 0) {
      report.alerts = alerts;
    }
    const lifeIndex = extractLifeIndex(weather);
    if (Object.keys(lifeIndex).length > 0) {
      report.life_index = lifeIndex;
    }
  }

  if (input.includeRaw) {
    report.raw = weather;
  }
  return report;
}
