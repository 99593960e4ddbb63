import * as p from '@clack/prompts';
import { getLogger, setLoggerTransports } from '@lender-rank/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private readonly startTime: number = Date.now();

  constructor(private readonly format: OutputFormat = 'text') {
    if (format === 'json') {
      // stdout carries the JSON response only
      setLoggerTransports({ console: false });
    }
  }

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const errorCode = exitCodeToErrorCode(exitCode);
    const response = createErrorResponse(command, error, errorCode);

    if (this.format === 'json') {
      // In JSON mode, write to stdout (not stderr) so callers can parse the response
      console.log(JSON.stringify(response, undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    process.exit(exitCode);
  }

  /**
   * Display a spinner (only in text mode).
   */
  spinner(): ReturnType<typeof p.spinner> | undefined {
    if (this.format === 'json') {
      return undefined;
    }
    return p.spinner();
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  log(message: string): void {
    if (this.format === 'text') {
      p.log.message(message);
    }
  }

  info(message: string): void {
    if (this.format === 'text') {
      p.log.info(message);
    }
  }

  /**
   * Display a warning (only in text mode).
   */
  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      // In JSON mode, warnings go to the structured log
      logger.warn(message);
    }
  }

  private displayTextError(error: Error, code: string): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    if (code === 'INVALID_ARGS') {
      p.note('Check your command arguments and try again.\nRun with --help for usage information.', 'Tip');
    } else if (code === 'CONFIG_ERROR') {
      p.note(
        'Set the value in your .env file or pass the matching flag.\nSee .env.example for every setting.',
        'How to fix'
      );
    } else if (code === 'NOT_FOUND') {
      p.note('Double-check the path and try again.', 'Tip');
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug({ stack: error.stack }, 'Stack trace');
    }
  }
}
