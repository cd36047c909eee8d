const pad = (value: number): string => value.toString().padStart(2, "0");

/** Local calendar date, `YYYY-MM-DD`. */
export const formatLocalDate = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

/** Local time truncated to the minute, `YYYY-MM-DDTHH:mm`. */
export const formatLocalMinute = (date: Date): string =>
  `${formatLocalDate(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}`;

/** Local time, `YYYY-MM-DD HH:mm:ss`. */
export const formatLocalDateTime = (date: Date): string =>
  `${formatLocalDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const addDays = (date: Date, days: number): Date =>
  new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);

export const startOfHour = (date: Date): Date =>
  new Date(date.getFullYear(), date.getMonth(), date.getDate(), date.getHours());

export const addHours = (date: Date, hours: number): Date => new Date(date.getTime() + hours * 3_600_000);
