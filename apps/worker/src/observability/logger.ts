import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'digestline-worker';
const LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : DEFAULT_LOG_LEVEL;
}

/** Logs go to stdout unless another destination is given. */
export function createWorkerLogger(env: NodeJS.ProcessEnv = process.env, destination?: DestinationStream): Logger {
  const service = env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;

  return pino(
    {
      level: readLogLevel(env),
      base: { service },
      timestamp: () => `,"ts":"${new Date().toISOString()}"`,
      formatters: {
        level: (label) => ({ level: label }),
      },
      messageKey: 'message',
    },
    destination ?? pino.destination(1),
  );
}
