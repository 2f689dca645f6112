/**
 * Environment bootstrap
 * 
 * Loads .env before any package reads process.env; must stay the
 * first import of the entry point.
 */

import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

if (process.argv.includes('--debug')) {
  process.env['LOG_LEVEL'] = 'debug';
}

// Keep the terminal for progress output unless asked otherwise
process.env['LOG_LEVEL'] ||= 'warn';
