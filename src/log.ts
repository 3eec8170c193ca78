export type LogFn = (message: string) => void;

export type Logger = {
  debug: LogFn;
  warn: LogFn;
};

export const noopLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

export function createLogger(opts: { verbose?: boolean; write?: LogFn } = {}): Logger {
  const write = opts.write ?? ((line: string) => console.error(line));
  return {
    debug: (message) => {
      if (opts.verbose) write(`[chatscope] ${message}`);
    },
    warn: (message) => {
      if (!process.env.CHATSCOPE_QUIET_WARNINGS) write(`[chatscope] warn: ${message}`);
    },
  };
}
