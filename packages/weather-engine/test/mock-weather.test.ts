import { describe, expect, it } from "vitest";
import { MOCK_MAX_HOURLY_STEPS, buildMockWeather } from "../src/mock/weather.js";
import { asArray, isRecord, recordAt } from "../src/json.js";
import type { JsonValue } from "../src/json.js";

const NOW = new Date(2024, 4, 1, 10, 25, 40);
const base = { lng: 116.397428, lat: 39.90923, now: NOW } as const;

const hourlySeries = (payload: JsonValue, field: string): JsonValue[] =>
  asArray(recordAt(recordAt(payload, "result"), "hourly")[field]);

const stripTimes = (value: JsonValue): JsonValue => {
  if (Array.isArray(value)) return value.map(stripTimes);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([key]) => !["date", "datetime", "pubtimestamp"].includes(key))
        .map(([key, child]) => [key, stripTimes(child)])
    );
  }
  return value;
};

describe("buildMockWeather", () => {
  it("derives the realtime snapshot from the latitude", () => {
    const payload = buildMockWeather({ ...base, days: 1, detail: "basic", hourlySteps: 6 });

    expect(payload.status).toBe("ok");
    expect(payload.location).toEqual([116.397428, 39.90923]);
    expect(recordAt(payload, "result").realtime).toEqual({
      temperature: 19.7,
      apparent_temperature: 19.1,
      skycon: "PARTLY_CLOUDY_DAY",
      humidity: 0.62,
      wind: { speed: 12, direction: 85 },
      air_quality: { aqi: { chn: 58, usa: 46 }, pm25: 16 }
    });
  });

  it("produces one daily entry per day with the sky cycle", () => {
    const payload = buildMockWeather({ ...base, days: 7, detail: "basic", hourlySteps: 6 });
    const daily = recordAt(recordAt(payload, "result"), "daily");

    expect(daily.temperature).toEqual([
      { date: "2024-05-01", min: 14.9, max: 21.9 },
      { date: "2024-05-02", min: 15.9, max: 22.9 },
      { date: "2024-05-03", min: 14.9, max: 23.9 },
      { date: "2024-05-04", min: 15.9, max: 21.9 },
      { date: "2024-05-05", min: 14.9, max: 22.9 },
      { date: "2024-05-06", min: 15.9, max: 23.9 },
      { date: "2024-05-07", min: 14.9, max: 21.9 }
    ]);
    expect(asArray(daily.skycon).map((entry) => (isRecord(entry) ? entry.value : null))).toEqual([
      "CLEAR_DAY",
      "PARTLY_CLOUDY_DAY",
      "LIGHT_RAIN",
      "CLOUDY",
      "MODERATE_RAIN",
      "CLEAR_DAY",
      "PARTLY_CLOUDY_DAY"
    ]);
    expect(daily.life_index).toBeUndefined();
  });

  it("starts the hourly series at the current hour", () => {
    const payload = buildMockWeather({ ...base, days: 1, detail: "basic", hourlySteps: 5 });

    expect(hourlySeries(payload, "temperature")).toEqual([
      { datetime: "2024-05-01T10:00", value: 18.9 },
      { datetime: "2024-05-01T11:00", value: 19.5 },
      { datetime: "2024-05-01T12:00", value: 20.1 },
      { datetime: "2024-05-01T13:00", value: 20.7 },
      { datetime: "2024-05-01T14:00", value: 18.9 }
    ]);
    expect(hourlySeries(payload, "precipitation")).toEqual([
      { datetime: "2024-05-01T10:00", value: 0, probability: 0 },
      { datetime: "2024-05-01T11:00", value: 0.03, probability: 3 },
      { datetime: "2024-05-01T12:00", value: 0.06, probability: 6 },
      { datetime: "2024-05-01T13:00", value: 0.09, probability: 9 },
      { datetime: "2024-05-01T14:00", value: 0.12, probability: 12 }
    ]);
  });

  it("caps hourly steps to 1..48", () => {
    const many = buildMockWeather({ ...base, days: 1, detail: "full", hourlySteps: 360 });
    const none = buildMockWeather({ ...base, days: 1, detail: "full", hourlySteps: 0 });

    expect(hourlySeries(many, "temperature")).toHaveLength(MOCK_MAX_HOURLY_STEPS);
    expect(hourlySeries(many, "skycon")).toHaveLength(48);
    expect(hourlySeries(none, "temperature")).toHaveLength(1);
  });

  it("adds minutely, life index and an alert in full detail", () => {
    const payload = buildMockWeather({ ...base, days: 2, detail: "full", hourlySteps: 24 });
    const result = recordAt(payload, "result");
    const minutely = recordAt(result, "minutely");
    const probability = asArray(minutely.probability);

    expect(minutely.description).toBe("未来两小时有零星小雨");
    expect(probability).toHaveLength(120);
    expect(probability.slice(0, 9)).toEqual([0, 0.05, 0.1, 0.15, 0.2, 0.25, 0.3, 0.35, 0]);
    expect(Object.keys(recordAt(recordAt(result, "daily"), "life_index"))).toEqual([
      "ultraviolet",
      "carWashing",
      "dressing"
    ]);
    expect(recordAt(result, "alert").content).toEqual([
      {
        title: "雷电黄色预警",
        code: "11B02",
        status: "预警中",
        description: "局地可能伴随雷电活动。",
        pubtimestamp: Math.floor(NOW.getTime() / 1000)
      }
    ]);
  });

  it("is deterministic apart from dates and timestamps", () => {
    const first = buildMockWeather({ ...base, days: 5, detail: "full", hourlySteps: 30 });
    const second = buildMockWeather({
      ...base,
      now: new Date(2025, 0, 15, 3, 5),
      days: 5,
      detail: "full",
      hourlySteps: 30
    });

    expect(stripTimes(second)).toEqual(stripTimes(first));
  });
});
