import pino, { type Level, type LevelWithSilent, type Logger } from 'pino';
import pretty from 'pino-pretty';

export type { Logger } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

// Unknown names fall back to info
function levelFrom(value: string | undefined): LevelWithSilent {
  return LEVELS.find((level) => level === value) ?? 'info';
}

// A silent logger writes nothing, so its streams only need the highest level
function streamLevel(level: LevelWithSilent): Level {
  return level === 'silent' ? 'fatal' : level;
}

const consoleStream = () =>
  pretty({
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
    sync: true,
  });

// Module logger used until the configuration is loaded (and by components given no logger)
export const logger: Logger = pino({ level: levelFrom(process.env.LOG_LEVEL) }, consoleStream());

export type LoggerOptions = {
  level: string;
  file?: string; // append-only log file, one line per record
};

// Console plus, when a file is given, single-line records appended to it.
// Writes are synchronous so every record lands as one whole line.
// Throws when the file cannot be opened.
export function createLogger(options: LoggerOptions): Logger {
  const level = levelFrom(options.level);
  const streams: pino.StreamEntry[] = [{ level: streamLevel(level), stream: consoleStream() }];
  if (options.file) {
    streams.push({
      level: streamLevel(level),
      stream: pretty({
        destination: options.file,
        mkdir: true,
        append: true,
        colorize: false,
        singleLine: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        sync: true,
      }),
    });
  }
  return pino({ level, timestamp: pino.stdTimeFunctions.isoTime }, pino.multistream(streams));
}
