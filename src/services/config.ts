import { ConfigError } from '../errors.js';
import type { Env, LogTimeConfig } from '../types/config.js';

export const DEFAULTS = {
  authHost: 'accounts.zoho.in',
  projectsHost: 'projectsapi.zoho.com',
  billStatus: 'Billable',
  notesPrefix: 'GitHub auto log',
  timeZone: 'Asia/Kolkata',
  startTime: '09:30',
  endTime: '18:30',
  timeoutMs: 30000,
} as const;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value ? value : undefined;
}

function requireEnv(env: Env, name: string): string {
  const value = readEnv(env, name);
  if (!value) {
    throw new ConfigError(`Missing required environment variable: ${name}`);
  }
  return value;
}

function readTimeout(env: Env): number {
  const raw = readEnv(env, 'ZOHO_HTTP_TIMEOUT_MS');
  if (raw === undefined) {
    return DEFAULTS.timeoutMs;
  }
  if (!/^\d+$/.test(raw) || Number(raw) === 0) {
    throw new ConfigError(`ZOHO_HTTP_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return Number(raw);
}

/**
 * Builds the run configuration from environment variables. Empty values are
 * treated as unset.
 */
export function loadConfig(env: Env = process.env): LogTimeConfig {
  return {
    clientId: requireEnv(env, 'ZOHO_CLIENT_ID'),
    clientSecret: requireEnv(env, 'ZOHO_CLIENT_SECRET'),
    refreshToken: requireEnv(env, 'ZOHO_REFRESH_TOKEN'),
    authHost: readEnv(env, 'ZOHO_DC') ?? DEFAULTS.authHost,
    projectsHost: readEnv(env, 'ZOHO_PROJECTS_HOST') ?? DEFAULTS.projectsHost,
    portalId: requireEnv(env, 'ZOHO_PORTAL_ID'),
    projectId: requireEnv(env, 'ZOHO_PROJECT_ID'),
    taskId: requireEnv(env, 'ZOHO_TASK_ID'),
    ownerId: readEnv(env, 'ZOHO_USER_ID'),
    billStatus: readEnv(env, 'ZOHO_BILL_STATUS') ?? DEFAULTS.billStatus,
    notesPrefix: readEnv(env, 'ZOHO_NOTES_PREFIX') ?? DEFAULTS.notesPrefix,
    timeZone: readEnv(env, 'ZOHO_TIMEZONE') ?? DEFAULTS.timeZone,
    startTime: readEnv(env, 'ZOHO_TIME_START') ?? DEFAULTS.startTime,
    endTime: readEnv(env, 'ZOHO_TIME_END') ?? DEFAULTS.endTime,
    timeoutMs: readTimeout(env),
  };
}
