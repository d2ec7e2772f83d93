#!/usr/bin/env tsx

import 'dotenv/config';
import {
  createDb, closeDb, createLogger, createStoreContext, loadConfig,
} from '@todo-hotel/core';
import { createProgram } from './program.js';
import { $try } from './helpers.js';

$try(() => {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  // Initialize database
  const db = createDb(config.dbPath);
  logger.debug('Opened task store', { path: config.dbPath });

  try {
    createProgram(createStoreContext(db, { logger }), { timeZone: config.timeZone }).parse();
  } finally {
    closeDb(db);
  }
});
