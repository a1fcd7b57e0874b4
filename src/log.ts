// All output goes to stderr: stdout carries the MCP transport.

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  debug(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[scroll-pilot] [${scope}]`;
  return {
    info: (message) => console.error(`${prefix} ${message}`),
    warn: (message) => console.error(`${prefix} WARN ${message}`),
    error: (message, err) => {
      if (err === undefined) console.error(`${prefix} ERROR ${message}`);
      else console.error(`${prefix} ERROR ${message}:`, err);
    },
    debug: (message) => {
      if (debugEnabled) console.error(`${prefix} DEBUG ${message}`);
    },
  };
}
