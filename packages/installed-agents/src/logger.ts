import type { Logger } from './types';

/** Logger that writes `<prefix>: <msg>` lines to stderr, keeping stdout for JSON output. */
export function createStderrLogger(prefix: string, opts: { debug?: boolean } = {}): Logger {
  const write = (msg: string) => process.stderr.write(`${prefix}: ${msg}\n`);
  return {
    info: write,
    warn: (msg) => write(`warning: ${msg}`),
    error: (msg) => write(`error: ${msg}`),
    debug: opts.debug ? (msg) => write(`debug: ${msg}`) : undefined,
  };
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
