import pino from 'pino';
import fs from 'fs-extra';
import * as path from 'path';
import { config } from './config';

export type Logger = pino.Logger;

function buildLoggerOptions(): pino.LoggerOptions {
  const loggerConfig: pino.LoggerOptions = {
    level: config.LOG_LEVEL,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.NODE_ENV === 'test') {
    return loggerConfig;
  }

  if (config.NODE_ENV === 'development') {
    // Pretty logging on stderr; stdout carries the prompts
    loggerConfig.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: 2,
      },
    };
    return loggerConfig;
  }

  const logsDir = path.resolve(config.LOG_DIR);
  fs.ensureDirSync(logsDir);

  loggerConfig.transport = {
    targets: [
      {
        target: 'pino/file',
        options: { destination: path.join(logsDir, 'app.log') },
        level: 'info',
      },
      {
        target: 'pino/file',
        options: { destination: path.join(logsDir, 'error.log') },
        level: 'error',
      },
    ],
  };
  return loggerConfig;
}

export const logger: Logger = pino(buildLoggerOptions());
