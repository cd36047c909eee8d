export interface Logger {
  debug(message: string): void;
}

export const silentLogger: Logger = {
  debug() {}
};

export interface StderrLoggerOptions {
  write?: (line: string) => void;
}

export const createStderrLogger = (options: StderrLoggerOptions = {}): Logger => {
  const write = options.write ?? ((line: string) => process.stderr.write(line));
  return {
    debug(message: string) {
      write(`[debug] ${message}\n`);
    }
  };
};
