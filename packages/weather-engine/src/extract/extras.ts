import { asArray, asNumber, asString, asText, isRecord, recordAt } from "../json.js";
import type { JsonValue } from "../json.js";
import { roundTo } from "./normalize.js";
import type { LifeIndexSummary, MinutelySummary, WeatherAlert } from "./types.js";

export function extractAlerts(payload: JsonValue): WeatherAlert[] {
  const nested = recordAt(recordAt(payload, "result"), "alert").content;
  const content = Array.isArray(nested) ? nested : recordAt(payload, "alert").content;
  if (!Array.isArray(content)) {
    return [];
  }

  const alerts: WeatherAlert[] = [];
  for (const item of content) {
    if (!isRecord(item)) continue;
    alerts.push({
      title: asString(item.title),
      code: asString(item.code),
      status: asString(item.status),
      description: asText(item.description) ?? asText(item.desc),
      pubtimestamp: asNumber(item.pubtimestamp)
    });
  }
  return alerts;
}

const isPresent = (value: JsonValue | undefined): value is JsonValue =>
  value !== undefined && value !== null && value !== "";

export function extractLifeIndex(payload: JsonValue): LifeIndexSummary {
  const lifeIndex = recordAt(recordAt(recordAt(payload, "result"), "daily"), "life_index");
  const summary: LifeIndexSummary = {};

  for (const [category, values] of Object.entries(lifeIndex)) {
    if (!Array.isArray(values) || values.length === 0) continue;
    const first = values[0];
    if (!isRecord(first)) {
      summary[category] = first;
      continue;
    }
    const picked = [first.desc, first.index, first.value].find(isPresent);
    summary[category] = picked ?? null;
  }
  return summary;
}

export function extractMinutelySummary(payload: JsonValue): MinutelySummary {
  const minutely = recordAt(recordAt(payload, "result"), "minutely");
  const probabilities = asArray(minutely.probability)
    .map(asNumber)
    .filter((value): value is number => value !== null);

  return {
    description: asString(minutely.description),
    max_probability: probabilities.length > 0 ? roundTo(Math.max(...probabilities), 3) : null
  };
}
