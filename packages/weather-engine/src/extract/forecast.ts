import { asArray, asNumber, asText, isRecord, recordAt } from "../json.js";
import type { JsonObject, JsonValue } from "../json.js";
import { normalizeDate, normalizeDateTime, normalizeProbabilityPercent } from "./normalize.js";
import { skyconText } from "./skycon.js";
import type { DailyForecast, HourlyForecast } from "./types.js";

export const HOURLY_LIMIT = { basic: 6, full: 24 } as const;

const entryAt = (list: JsonValue[], index: number): JsonObject => {
  const item = list[index];
  return isRecord(item) ? item : {};
};

/*
 * Daily and hourly series are paired by position, not by their date fields: the i-th
 * temperature goes with the i-th skycon (and precipitation). Misaligned upstream arrays
 * would be mispaired silently.
 */

export function extractDailyForecast(payload: JsonValue, days: number): DailyForecast[] {
  const daily = recordAt(recordAt(payload, "result"), "daily");
  const temperatures = asArray(daily.temperature);
  const skycons = asArray(daily.skycon);
  const count = Math.min(days, temperatures.length);

  const forecast: DailyForecast[] = [];
  for (let i = 0; i < count; i += 1) {
    const temperature = entryAt(temperatures, i);
    const sky = entryAt(skycons, i);
    forecast.push({
      date: normalizeDate(asText(temperature.date) ?? asText(sky.date) ?? `D+${i}`),
      min: asNumber(temperature.min),
      max: asNumber(temperature.max),
      skycon: skyconText(sky.value)
    });
  }
  return forecast;
}

export function extractHourlyForecast(payload: JsonValue, limit: number): HourlyForecast[] {
  const hourly = recordAt(recordAt(payload, "result"), "hourly");
  const temperatures = asArray(hourly.temperature);
  const skycons = asArray(hourly.skycon);
  const precipitation = asArray(hourly.precipitation);
  const count = Math.min(limit, temperatures.length);

  const forecast: HourlyForecast[] = [];
  for (let i = 0; i < count; i += 1) {
    const temperature = entryAt(temperatures, i);
    const sky = entryAt(skycons, i);
    const precip = entryAt(precipitation, i);
    const datetime =
      asText(temperature.datetime) ?? asText(sky.datetime) ?? asText(precip.datetime) ?? `H+${i}`;
    forecast.push({
      datetime: normalizeDateTime(datetime),
      temperature: asNumber(temperature.value),
      skycon: skyconText(sky.value),
      precipitation: asNumber(precip.value),
      precipitation_probability: normalizeProbabilityPercent(precip.probability)
    });
  }
  return forecast;
}
