#!/usr/bin/env node
import 'dotenv/config';

import { loadConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { startRelay } from './app.js';

const config = loadConfig();
const logger = new Logger(config.logging.level);

startRelay(config, logger).catch((error: unknown) => {
  logger.error('Gateway failed to start', error);
  process.exitCode = 1;
});
