import log, { LogLevelDesc } from 'loglevel';

export const LOGGER_NAME = 'forensics-jobs';

export const LogLevels = log.levels;

export const LOG_LEVEL_NAMES = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'silent',
] as const;

export const logger = log.getLogger(LOGGER_NAME);

export const setLogLevel = (level: LogLevelDesc) => {
  logger.setLevel(level, false);
};
