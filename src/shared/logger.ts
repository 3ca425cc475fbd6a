import pino, { type DestinationStream, type Level, type Logger } from 'pino';

// Verbosity 0..3. Directory dumps go out at debug (2), per-case lines and SMTP
// transcripts at trace (3).
const VERBOSITY_LEVELS: readonly Level[] = ['warn', 'info', 'debug', 'trace'];

export function levelForVerbosity(verbosity: number): Level {
  const idx = Math.max(0, Math.min(VERBOSITY_LEVELS.length - 1, Math.trunc(verbosity)));
  return VERBOSITY_LEVELS[idx] ?? 'info';
}

export function createLogger(verbosity: number, destination?: DestinationStream): Logger {
  const options = {
    name: 'milter-runner',
    level: process.env['LOG_LEVEL'] ?? levelForVerbosity(verbosity),
    transport:
      destination === undefined && process.env['NODE_ENV'] === 'development'
        ? { target: 'pino/file', options: { destination: 2 } }
        : undefined,
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = createLogger(1);
