import type { AxiosAdapter } from 'axios';
import type { DateTime } from 'luxon';
import { RemoteCallError } from '../errors.js';
import type { Env, LogTimeConfig } from '../types/config.js';
import type { LogEntryOptions } from '../types/zoho.js';
import { AuthService } from './auth.js';
import { loadConfig } from './config.js';
import { errorMessage, type HttpOptions } from './http.js';
import { computeWindow } from './timeWindow.js';
import { buildLogForm, ZohoProjectsService } from './zoho.js';

export type Logger = Pick<Console, 'log' | 'error'>;

export interface RunOptions {
  env?: Env;
  now?: DateTime;
  logger?: Logger;
  adapter?: AxiosAdapter;
  /** Compute and print the payload without calling Zoho. */
  dryRun?: boolean;
}

function entryOptions(config: LogTimeConfig): LogEntryOptions {
  return {
    billStatus: config.billStatus,
    notesPrefix: config.notesPrefix,
    ownerId: config.ownerId,
  };
}

function reportFailure(logger: Logger, error: unknown): void {
  logger.error(`Error: ${errorMessage(error)}`);
  if (error instanceof RemoteCallError && error.http) {
    logger.error(`HTTP Error: ${error.http.status} ${error.http.statusText}`);
    logger.error(error.http.body);
  }
}

/**
 * Runs the whole job once and returns the process exit code: 0 when the
 * time log was created, 1 on any failure.
 */
export async function runDailyLog(options: RunOptions = {}): Promise<number> {
  const logger = options.logger ?? console;
  try {
    const config = loadConfig(options.env);
    const window = computeWindow(config.timeZone, config.startTime, config.endTime, options.now);
    const entry = entryOptions(config);
    logger.log(`Logging time for date=${window.date}, hours=${window.hours}`);

    if (options.dryRun) {
      logger.log(`Dry run, not submitting: ${buildLogForm(window, entry).toString()}`);
      return 0;
    }

    const http: HttpOptions = { timeoutMs: config.timeoutMs, adapter: options.adapter };
    const accessToken = await new AuthService(config, http).acquireAccessToken();
    const result = await new ZohoProjectsService(config.projectsHost, http).submitLog(
      accessToken,
      config,
      window,
      entry
    );

    logger.log(`Zoho response status: ${result.status}`);
    logger.log(`Zoho response body: ${result.body}`);
    return 0;
  } catch (error) {
    reportFailure(logger, error);
    return 1;
  }
}

/** Prints the window a run would log right now. Makes no network calls. */
export function printWindow(options: Pick<RunOptions, 'env' | 'now' | 'logger'> = {}): number {
  const logger = options.logger ?? console;
  try {
    const config = loadConfig(options.env);
    const window = computeWindow(config.timeZone, config.startTime, config.endTime, options.now);
    logger.log(`date=${window.date} hours=${window.hours} timezone=${config.timeZone}`);
    return 0;
  } catch (error) {
    reportFailure(logger, error);
    return 1;
  }
}
