export interface Logger {
  debug(message: string): void;
}

export function createLogger(scope: string, enabled: boolean): Logger {
  return {
    debug(message) {
      if (enabled) console.debug(`[${scope}] ${message}`);
    },
  };
}
