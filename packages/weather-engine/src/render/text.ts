import type { DetailLevel } from "../adapters/types.js";
import type { HourlyForecast } from "../extract/types.js";
import type { Report } from "../report.js";

export const WEEKDAY_TEXT = ["周一", "周二", "周三", "周四", "周五", "周六", "周日"] as const;

const MAX_DAILY_LINES = 3;
const MAX_HOURLY_LINES = 6;
const MAX_ALERT_LINES = 3;
const PLACEHOLDER = "--";

const show = (value: number | string | null | undefined): string =>
  value === null || value === undefined ? PLACEHOLDER : String(value);

/**
 * Weekday for a `YYYY-MM-DD` date, or null when the text is not a real calendar date.
 */
export function weekdayText(date: string): string | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const parsed = new Date(Date.UTC(year, month - 1, day));
  if (parsed.getUTCFullYear() !== year || parsed.getUTCMonth() !== month - 1 || parsed.getUTCDate() !== day) {
    return null;
  }
  // getUTCDay() counts from Sunday
  return WEEKDAY_TEXT[(parsed.getUTCDay() + 6) % 7];
}

export function formatHourlyLine(item: HourlyForecast): string {
  const datetime = item.datetime;
  const clock = /\d{2}:\d{2}$/.test(datetime) ? datetime.slice(-5) : datetime;
  const temperature = item.temperature === null ? `${PLACEHOLDER}°C` : `${item.temperature.toFixed(2)}°C`;
  const probability =
    item.precipitation_probability === null ? PLACEHOLDER : `${Math.round(item.precipitation_probability)}%`;
  const amount = item.precipitation === null ? PLACEHOLDER : item.precipitation.toFixed(2);

  return `${clock.padStart(5)}  ${item.skycon.padEnd(2)}  ${temperature.padEnd(8)}  降水 ${probability.padStart(3)}  ${amount} mm/h`;
}

/**
 * Compact multi-section report meant for chat clients: bold titles, bullets and one
 * monospace block for the hourly forecast.
 */
export function renderText(report: Report, detail: DetailLevel): string {
  const lines: string[] = [];
  const { realtime } = report;

  lines.push(`**${report.resolved_address}｜天气**`);
  lines.push(`\`查询时间 ${report.query_time.slice(0, 16)}\``);
  lines.push("");

  const daily = report.daily.slice(0, MAX_DAILY_LINES);
  lines.push(daily.length > 0 ? `**近 ${daily.length} 日**` : "**近几日**");
  for (const day of daily) {
    const label = weekdayText(day.date) ?? day.date;
    lines.push(`• ${label} ${day.skycon}  ${show(day.min)}～${show(day.max)}°C`);
  }
  lines.push("");

  lines.push("**当前**");
  lines.push(
    `• ${show(realtime.temperature)}°C（体感 ${show(realtime.apparent_temperature)}°C）｜湿度 ${show(realtime.humidity_percent)}%`
  );
  lines.push("");

  const hourly = report.hourly ?? [];
  if (hourly.length > 0) {
    lines.push("**未来 6 小时**");
    lines.push("```text");
    for (const item of hourly.slice(0, MAX_HOURLY_LINES)) {
      lines.push(formatHourlyLine(item));
    }
    lines.push("```");
  }

  if (detail === "full") {
    if (realtime.aqi_chn !== null || realtime.pm25 !== null) {
      lines.push(`空气质量: AQI(国标) ${show(realtime.aqi_chn)}, PM2.5 ${show(realtime.pm25)}`);
    }

    const minutely = report.minutely;
    if (minutely && (minutely.description || minutely.max_probability !== null)) {
      const maxProbability =
        minutely.max_probability === null ? PLACEHOLDER : `${Math.round(minutely.max_probability * 100)}%`;
      lines.push(`分钟级降雨: ${minutely.description || "无"} (最大概率 ${maxProbability})`);
    }

    const alerts = report.alerts ?? [];
    if (alerts.length > 0) {
      lines.push(`⚠️ 天气预警: ${alerts.length} 条`);
      for (const alert of alerts.slice(0, MAX_ALERT_LINES)) {
        lines.push(`  ${show(alert.title)} (${alert.status ?? "未知状态"})`);
      }
    }
  }

  return lines.join("\n");
}
