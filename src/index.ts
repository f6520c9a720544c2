#!/usr/bin/env node
import { Command } from 'commander';
import { config } from 'dotenv';
import { printWindow, runDailyLog } from './services/dailyLog.js';

interface EnvFileOptions {
  envFile?: string;
}

interface LogCommandOptions extends EnvFileOptions {
  dryRun?: boolean;
}

// Variables already set in the environment win over the file.
function loadEnvFile(options: EnvFileOptions): void {
  config(options.envFile ? { path: options.envFile } : undefined);
}

const program = new Command();

program
  .name('zoho-log-time')
  .description("Log yesterday's working hours against a Zoho Projects task")
  .version('1.0.0');

program
  .command('log', { isDefault: true })
  .description('Exchange the refresh token and create one time log for yesterday')
  .option('--dry-run', 'print the entry that would be logged without calling Zoho')
  .option('--env-file <path>', 'read settings from this file instead of .env')
  .action(async (options: LogCommandOptions) => {
    loadEnvFile(options);
    process.exitCode = await runDailyLog({ dryRun: options.dryRun });
  });

program
  .command('window')
  .description('Show the date and hours the next run would log')
  .option('--env-file <path>', 'read settings from this file instead of .env')
  .action((options: EnvFileOptions) => {
    loadEnvFile(options);
    process.exitCode = printWindow();
  });

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : 'An unknown error occurred');
  process.exitCode = 1;
});
