import { start } from './api';
import { logger } from './common/logger';
import { errorMessage } from './common/errors';

start().catch((err: unknown) => {
  logger.error('startup_failed', { err: errorMessage(err) });
  process.exit(1);
});
