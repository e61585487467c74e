/**
 * Receives the coordinator's request log lines
 */
export interface LoggingDelegate {
  log(message: string, isError: boolean): void;
}

/**
 * Used when no delegate is set
 */
export const consoleLogger: LoggingDelegate = {
  log(message, isError) {
    if (isError) {
      console.error(`[NetKit] ${message}`);
    } else {
      console.log(`[NetKit] ${message}`);
    }
  },
};

export const silentLogger: LoggingDelegate = {
  log() {},
};
