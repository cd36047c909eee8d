import type { DetailLevel, WeatherPayload } from "../adapters/types.js";
import type { JsonObject } from "../json.js";
import { addDays, addHours, formatLocalDate, formatLocalMinute, startOfHour } from "../time.js";

export const MOCK_SKY_CYCLE = ["CLEAR_DAY", "PARTLY_CLOUDY_DAY", "LIGHT_RAIN", "CLOUDY", "MODERATE_RAIN"] as const;
export const MOCK_MAX_HOURLY_STEPS = 48;
const MINUTELY_POINTS = 120;

export interface MockWeatherOptions {
  lng: number;
  lat: number;
  days: number;
  detail: DetailLevel;
  hourlySteps: number;
  now?: Date;
}

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max);

const skyAt = (index: number): string => MOCK_SKY_CYCLE[index % MOCK_SKY_CYCLE.length];

/**
 * Fixture payload in the weather service's response shape. Every number depends only on
 * `lat` and the step index; dates and timestamps follow the clock.
 */
export function buildMockWeather(options: MockWeatherOptions): WeatherPayload {
  const { lng, lat, days, detail } = options;
  const now = options.now ?? new Date();
  const baseTemp = 14 + (Math.abs(lat) % 5);
  const today = addDays(now, 0);

  const dailyTemperature: JsonObject[] = [];
  const dailySkycon: JsonObject[] = [];
  for (let i = 0; i < days; i += 1) {
    const date = formatLocalDate(addDays(today, i));
    dailyTemperature.push({
      date,
      min: round(baseTemp - 4 + (i % 2), 1),
      max: round(baseTemp + 3 + (i % 3), 1)
    });
    dailySkycon.push({ date, value: skyAt(i) });
  }

  const steps = clamp(Math.floor(options.hourlySteps), 1, MOCK_MAX_HOURLY_STEPS);
  const firstHour = startOfHour(now);
  const hourlyTemperature: JsonObject[] = [];
  const hourlySkycon: JsonObject[] = [];
  const hourlyPrecipitation: JsonObject[] = [];
  for (let i = 0; i < steps; i += 1) {
    const datetime = formatLocalMinute(addHours(firstHour, i));
    const precipitation = round((i % 5) * 0.03, 2);
    hourlyTemperature.push({ datetime, value: round(baseTemp + (i % 4) * 0.6, 1) });
    hourlySkycon.push({ datetime, value: skyAt(i) });
    hourlyPrecipitation.push({ datetime, value: precipitation, probability: Math.round(precipitation * 100) });
  }

  const daily: JsonObject = { temperature: dailyTemperature, skycon: dailySkycon };
  const result: JsonObject = {
    realtime: {
      temperature: round(baseTemp + 0.8, 1),
      apparent_temperature: round(baseTemp + 0.2, 1),
      skycon: "PARTLY_CLOUDY_DAY",
      humidity: 0.62,
      wind: { speed: 12.0, direction: 85 },
      air_quality: { aqi: { chn: 58, usa: 46 }, pm25: 16 }
    },
    daily,
    hourly: {
      temperature: hourlyTemperature,
      skycon: hourlySkycon,
      precipitation: hourlyPrecipitation
    }
  };

  if (detail === "full") {
    const todayText = formatLocalDate(today);
    result.minutely = {
      description: "未来两小时有零星小雨",
      probability: Array.from({ length: MINUTELY_POINTS }, (_, i) => round((i % 8) * 0.05, 2))
    };
    daily.life_index = {
      ultraviolet: [{ date: todayText, index: "2", desc: "弱" }],
      carWashing: [{ date: todayText, index: "2", desc: "较适宜" }],
      dressing: [{ date: todayText, index: "3", desc: "较舒适" }]
    };
    result.alert = {
      content: [
        {
          title: "雷电黄色预警",
          code: "11B02",
          status: "预警中",
          description: "局地可能伴随雷电活动。",
          pubtimestamp: Math.floor(now.getTime() / 1000)
        }
      ]
    };
  }

  return {
    status: "ok",
    result,
    location: [lng, lat]
  };
}
