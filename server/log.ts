export type LogFn = (message: string) => void;

export interface Logger {
  info: LogFn;
  warn: LogFn;
}

function timestamp(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
}

// stdout is reserved for the CLI's JSON result
export function createLogger(source: string): Logger {
  return {
    info: (message) => console.error(`${timestamp()} [${source}] ${message}`),
    warn: (message) => console.warn(`${timestamp()} [${source}] warning: ${message}`),
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
};
