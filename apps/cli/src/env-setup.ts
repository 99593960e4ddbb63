/**
 * Environment setup for the CLI - must be imported before any other module.
 *
 * Loads `.env` from the working directory, then applies CLI logging defaults.
 * File logging is on by default for the CLI; CLI_FILE_LOG_ENABLED overrides it.
 */
import { config } from 'dotenv';

config();

if (process.env['CLI_FILE_LOG_ENABLED'] !== undefined) {
  process.env['LOGGER_FILE_LOG_ENABLED'] = process.env['CLI_FILE_LOG_ENABLED'];
} else {
  process.env['LOGGER_FILE_LOG_ENABLED'] = 'true';
}
