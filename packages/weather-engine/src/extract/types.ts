import type { JsonValue } from "../json.js";

export interface RealtimeSummary {
  temperature: number | null;
  apparent_temperature: number | null;
  /** Display text, never a raw code unless the code is unmapped. */
  skycon: string;
  humidity_percent: number | null;
  wind_speed: number | null;
  wind_direction: number | null;
  aqi_chn: number | null;
  pm25: number | null;
}

export interface DailyForecast {
  /** `YYYY-MM-DD`, or `D+<i>` when the service sent no date. */
  date: string;
  min: number | null;
  max: number | null;
  skycon: string;
}

export interface HourlyForecast {
  /** `YYYY-MM-DD HH:mm`, or `H+<i>` when the service sent no time. */
  datetime: string;
  temperature: number | null;
  skycon: string;
  /** mm/h */
  precipitation: number | null;
  /** 0-100 */
  precipitation_probability: number | null;
}

export interface MinutelySummary {
  description: string | null;
  /** Fraction in 0-1, as sent by the service. */
  max_probability: number | null;
}

export interface WeatherAlert {
  title: string | null;
  code: string | null;
  status: string | null;
  description: string | null;
  pubtimestamp: number | null;
}

export type LifeIndexSummary = Record<string, JsonValue>;
