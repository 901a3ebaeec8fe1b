// Command-line flow: argument → config → run → exit code.
//
// Everything with an outside effect (the API, waiting, time, output, the
// journal location) arrives through CliDeps, so the whole flow runs in tests
// against fakes. index.ts supplies the production wiring.

import { loadSyncConfig } from './config.js';
import { ConfigFileNotProvidedError } from './errors.js';
import {
  buildFailureReport, clearLatestFailure, formatFailureReport,
  readLatestFailure, writeFailureReport, type FailureContext, type FailureReport,
} from './failure-journal.js';
import { formatSummary } from './formatters.js';
import type { Sensitive } from './secret.js';
import { runRankSync } from './sync.js';
import type { Clock, GroupApi, RunProgress, Sleeper, SyncConfig, SyncReporter, SyncSummary } from './types.js';

export interface CliDeps {
  readonly createApi: (credential: Sensitive<string>) => GroupApi;
  readonly sleeper: Sleeper;
  readonly clock: Clock;
  readonly reporter: SyncReporter;
  readonly journalDir: string;
  readonly env: NodeJS.ProcessEnv;
}

/** Where a failed run stopped, for the journal */
export function failureContext(configPath: string, config: SyncConfig, progress: RunProgress): FailureContext {
  return {
    phase: progress.scannedRole === undefined ? 'resolving-roles' : 'syncing',
    configPath,
    groupId: config.groupId,
    scannedRole: progress.scannedRole,
    userId: progress.userId,
    assigned: progress.assigned,
  };
}

async function notePreviousFailure(deps: CliDeps): Promise<void> {
  try {
    const previous = await readLatestFailure(deps.journalDir);
    if (previous) {
      deps.reporter.note(`Previous run failed at ${previous.timestamp} (${previous.code}): ${previous.error}`);
    }
  } catch (error: unknown) {
    deps.reporter.note(`Could not read the previous failure report: ${errorMessage(error)}`);
  }
}

/**
 * Run the sync for `argv` (arguments after the program name) and return the
 * process exit code. Configuration problems are reported without touching the
 * journal; any failure after the config loads is journaled. Journal errors are
 * noted and never change the exit code.
 */
export async function runCli(
  argv: readonly string[],
  deps: CliDeps,
  progress: RunProgress = { assigned: 0 },
): Promise<number> {
  const configPath = argv[0];
  let config: SyncConfig;
  try {
    if (configPath === undefined) throw new ConfigFileNotProvidedError();
    config = loadSyncConfig(configPath, deps.env);
  } catch (error: unknown) {
    deps.reporter.note(errorMessage(error));
    return 1;
  }

  await notePreviousFailure(deps);

  let summary: SyncSummary;
  try {
    summary = await runRankSync({
      config,
      api: deps.createApi(config.roblosecurity),
      sleeper: deps.sleeper,
      clock: deps.clock,
      reporter: deps.reporter,
    }, progress);
  } catch (error: unknown) {
    const report = buildFailureReport(error, failureContext(configPath, config, progress), deps.clock);
    deps.reporter.note(formatFailureReport(report));
    await saveFailureReport(report, deps);
    return 1;
  }

  deps.reporter.note(formatSummary(summary));
  try {
    await clearLatestFailure(deps.journalDir);
  } catch (error: unknown) {
    deps.reporter.note(`Could not clear the previous failure report: ${errorMessage(error)}`);
  }
  return 0;
}

async function saveFailureReport(report: FailureReport, deps: CliDeps): Promise<void> {
  try {
    const filepath = await writeFailureReport(report, deps.journalDir);
    deps.reporter.note(`Failure report saved: ${filepath}`);
  } catch (error: unknown) {
    deps.reporter.note(`Could not write failure report: ${errorMessage(error)}`);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
