import { parseArgs } from "node:util";
import { resolveConfig } from "../config.js";
import type { ConfigInput, EnvSource } from "../config.js";
import { ConfigError, describeError } from "../errors.js";
import { createStderrLogger, silentLogger } from "../logging.js";
import { runWeatherQuery } from "../query.js";
import type { QueryDependencies } from "../query.js";

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: EnvSource;
}

export const USAGE = `Usage: weather-cn <place> [options]

Resolve a place (e.g. 北京市朝阳区) with AMap geocoding and show the Caiyun forecast.

Options:
  --cache-dir <dir>            cache directory (default: ./cache)
  --geo-ttl-hours <n>          geocode cache lifetime in hours (default: 720)
  --weather-ttl-minutes <n>    weather cache lifetime in minutes (default: 10)
  --timeout <seconds>          HTTP timeout per attempt (default: 8)
  --retries <n>                HTTP retries after the first attempt (default: 2)
  --amap-key <key>             AMap API key (default: $AMAP_API_KEY)
  --caiyun-token <token>       Caiyun API token (default: $CAIYUN_API_TOKEN)
  --detail <basic|full>        report detail level (default: basic)
  --format <text|json>         output format (default: text)
  --days <n>                   forecast days, 1-15 (default: 7)
  --hourly-steps <n>           hourly steps 1-360, used with --detail full (default: 24)
  --raw-caiyun                 include the raw weather response in JSON output
  --mock                       offline mode, no network requests
  --debug                      write diagnostic lines to stderr
  -h, --help                   show this help
`;

const OPTIONS = {
  "cache-dir": { type: "string" },
  "geo-ttl-hours": { type: "string" },
  "weather-ttl-minutes": { type: "string" },
  timeout: { type: "string" },
  retries: { type: "string" },
  "amap-key": { type: "string" },
  "caiyun-token": { type: "string" },
  detail: { type: "string" },
  format: { type: "string" },
  days: { type: "string" },
  "hourly-steps": { type: "string" },
  "raw-caiyun": { type: "boolean" },
  mock: { type: "boolean" },
  debug: { type: "boolean" },
  help: { type: "boolean", short: "h" }
} as const;

interface CommandLine {
  help: boolean;
  input: ConfigInput;
}

const readArgs = (argv: string[]) => {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new ConfigError(describeError(error));
  }
};

function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals } = readArgs(argv);
  return {
    help: values.help ?? false,
    input: {
      place: positionals.join(" "),
      cacheDir: values["cache-dir"],
      geoTtlHours: values["geo-ttl-hours"],
      weatherTtlMinutes: values["weather-ttl-minutes"],
      timeoutSeconds: values.timeout,
      retries: values.retries,
      amapKey: values["amap-key"],
      caiyunToken: values["caiyun-token"],
      detail: values.detail,
      format: values.format,
      days: values.days,
      hourlySteps: values["hourly-steps"],
      includeRaw: values["raw-caiyun"],
      mock: values.mock,
      debug: values.debug
    }
  };
}

/**
 * Runs one query and returns the process exit code. Every failure becomes a single
 * `error: ...` line on stderr.
 */
export async function runCli(
  argv: string[],
  io: CliIo,
  deps: Omit<QueryDependencies, "logger"> = {}
): Promise<number> {
  try {
    const commandLine = parseCommandLine(argv);
    if (commandLine.help) {
      io.stdout(USAGE);
      return 0;
    }

    const config = resolveConfig(commandLine.input, io.env);
    const logger = config.debug ? createStderrLogger({ write: io.stderr }) : silentLogger;
    const { output } = await runWeatherQuery(config, { ...deps, logger });
    io.stdout(`${output}\n`);
    return 0;
  } catch (error) {
    io.stderr(`error: ${describeError(error).split("\n")[0]}\n`);
    return 1;
  }
}
