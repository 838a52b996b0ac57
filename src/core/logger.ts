export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const toStructuredLogArgs = (message: string, context?: Record<string, unknown>): [string, Record<string, unknown>] =>
  [`[reorder] ${message}`, context ?? {}];

export const createConsoleLogger = (): Logger => {
  return {
    info(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.info(msg, ctx);
    },
    warn(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.warn(msg, ctx);
    },
    error(message, context) {
      const [msg, ctx] = toStructuredLogArgs(message, context);
      console.error(msg, ctx);
    }
  };
};

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {}
};
