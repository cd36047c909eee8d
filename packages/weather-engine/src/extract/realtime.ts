import { asNumber, recordAt } from "../json.js";
import type { JsonValue } from "../json.js";
import { skyconText } from "./skycon.js";
import type { RealtimeSummary } from "./types.js";

export function extractRealtime(payload: JsonValue): RealtimeSummary {
  const realtime = recordAt(recordAt(payload, "result"), "realtime");
  const airQuality = recordAt(realtime, "air_quality");
  const wind = recordAt(realtime, "wind");
  const humidity = asNumber(realtime.humidity);

  return {
    temperature: asNumber(realtime.temperature),
    apparent_temperature: asNumber(realtime.apparent_temperature),
    skycon: skyconText(realtime.skycon),
    humidity_percent: humidity === null ? null : Math.round(humidity * 100),
    wind_speed: asNumber(wind.speed),
    wind_direction: asNumber(wind.direction),
    aqi_chn: asNumber(recordAt(airQuality, "aqi").chn),
    pm25: asNumber(airQuality.pm25)
  };
}
