// src/lib/log.ts
// One JSON object per line: { msg, ...fields, ts }

export type LogFields = Record<string, unknown>;

export interface Logger {
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

function line(msg: string, fields: LogFields = {}): string {
  return JSON.stringify({ msg, ...fields, ts: new Date().toISOString() });
}

export const jsonConsoleLogger: Logger = {
  info: (msg, fields) => console.log(line(msg, fields)),
  warn: (msg, fields) => console.warn(line(msg, fields)),
  error: (msg, fields) => console.error(line(msg, fields)),
};

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
