import { startServer } from './index.js';
import { createLogger } from './lib/logger.js';

startServer().catch((err: unknown) => {
  createLogger('Server').error('Startup failed', err);
  process.exitCode = 1;
});
