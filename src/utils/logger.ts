import pino, { Logger, LevelWithSilent } from 'pino';

const rootLogger = pino({
  name: 'chorus-companion',
  level: process.env.LOG_LEVEL || 'info'
});

export type { Logger };

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export function setLogLevel(level: LevelWithSilent): void {
  rootLogger.level = level;
}
