import { logger } from '../src/utils/logger';

logger.silent = true;
