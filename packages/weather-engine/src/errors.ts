export type WeatherErrorCode = "config" | "fetch" | "resolution" | "upstream";

export class WeatherError extends Error {
  readonly code: WeatherErrorCode;

  constructor(code: WeatherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Missing credential or a parameter outside its accepted range.
 */
export class ConfigError extends WeatherError {
  constructor(message: string) {
    super("config", message);
  }
}

/**
 * Network, timeout or decode failure after the retry budget was spent.
 */
export class FetchError extends WeatherError {
  readonly url: string;
  readonly attempts: number;

  /**
   * @param detail - text of the last failure, already stripped of secrets
   */
  constructor(url: string, attempts: number, cause: unknown, detail: string) {
    super("fetch", `Request failed after ${attempts} attempt(s) for ${url}: ${detail}`, { cause });
    this.url = url;
    this.attempts = attempts;
  }
}

/**
 * Place not found, or the geocoding response could not be interpreted.
 */
export class ResolutionError extends WeatherError {
  constructor(message: string) {
    super("resolution", message);
  }
}

/**
 * Weather service answered with a well-formed failure status.
 */
export class UpstreamError extends WeatherError {
  readonly status: string;

  constructor(status: string, reason?: string) {
    super("upstream", `Weather service returned failure: ${[status, reason].filter(Boolean).join(" ")}`);
    this.status = status;
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
};
