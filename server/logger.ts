import type { LogLevel } from './config.ts';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export type Logger = {
  debug: (module: string, message: string) => void;
  info: (module: string, message: string) => void;
  warn: (module: string, message: string) => void;
  error: (module: string, message: string) => void;
};

/** Destination for formatted lines; console.log unless a test captures them. */
export type LogSink = (line: string) => void;

/**
 * Logger writing `timestamp | level | module | message` lines.
 * @param level - Lowest level that is written.
 * @param sink - Line writer.
 * @param now - Clock used for timestamps.
 */
export function createLogger(
  level: LogLevel,
  sink: LogSink = line => console.log(line),
  now: () => Date = () => new Date()
): Logger {
  const threshold = LEVELS[level];
  const log = (lvl: LogLevel, module: string, message: string) => {
    if (LEVELS[lvl] < threshold) return;
    sink(`${now().toISOString()} | ${lvl} | ${module} | ${message}`);
  };
  return {
    debug: (module, message) => log('debug', module, message),
    info: (module, message) => log('info', module, message),
    warn: (module, message) => log('warn', module, message),
    error: (module, message) => log('error', module, message)
  };
}
