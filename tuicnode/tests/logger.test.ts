import fs from 'fs';
import path from 'path';
import winston from 'winston';
import { configureLogger, logger } from '../src/utils/logger';
import { makeTempDir } from './helpers';

describe('configureLogger', () => {
  let dir: string;
  let level: string;

  beforeEach(() => {
    dir = makeTempDir();
    level = logger.level;
  });

  // The temp dir is left in place: file transports open their streams asynchronously.
  afterEach(() => {
    for (const transport of logger.transports.filter((t) => t instanceof winston.transports.File)) {
      logger.remove(transport);
    }
    logger.level = level;
  });

  it('should apply the configured level with the console transport only', () => {
    configureLogger({ level: 'warn' });

    expect(logger.level).toBe('warn');
    expect(logger.transports).toHaveLength(1);
  });

  it('should add file transports when a log file is configured', () => {
    const logFile = path.join(dir, 'logs', 'tuicnode.log');

    configureLogger({ level: 'debug', file: logFile });

    expect(logger.level).toBe('debug');
    expect(fs.existsSync(path.join(dir, 'logs'))).toBe(true);
    expect(logger.transports.filter((t) => t instanceof winston.transports.File)).toHaveLength(2);
  });
});
