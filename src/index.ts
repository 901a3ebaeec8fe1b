#!/usr/bin/env node

// Group Rank Sync
// Ranks every member of the configured Roblox group roles by the year their
// account was created. One-shot: run it, it walks every scanned role, it exits.

import { runCli, type CliDeps } from './cli.js';
import { RunInterruptedError } from './errors.js';
import { buildFailureReport, defaultJournalDir, writeFailureReportSync } from './failure-journal.js';
import { formatAssignment } from './formatters.js';
import { realSleeper } from './retry-policy.js';
import { RobloxGroupApi } from './roblox-client.js';
import { realClock, type RunProgress, type SyncReporter } from './types.js';

const reporter: SyncReporter = {
  assigned: (assignment) => {
    process.stdout.write(`${formatAssignment(assignment)}\n`);
  },
  note: (message) => {
    process.stderr.write(`[rank-sync] ${message}\n`);
  },
};

const deps: CliDeps = {
  createApi: (credential) => new RobloxGroupApi(credential),
  sleeper: realSleeper,
  clock: realClock,
  reporter,
  journalDir: defaultJournalDir(),
  env: process.env,
};

/** Shared with the signal handlers so an interrupted run can say where it stopped */
const progress: RunProgress = { assigned: 0 };

// --- Process-level failure handling ---
// On a signal: journal where the run was, then die. The journal is written
// synchronously because the pending API call will never settle.

function interrupt(signal: NodeJS.Signals, exitCode: number): void {
  process.stderr.write(`[rank-sync] Received ${signal}; stopping after ${progress.assigned} assignment(s).\n`);
  const report = buildFailureReport(new RunInterruptedError(signal), {
    phase: progress.scannedRole === undefined ? 'startup' : 'syncing',
    configPath: process.argv[2],
    scannedRole: progress.scannedRole,
    userId: progress.userId,
    assigned: progress.assigned,
  });
  const filepath = writeFailureReportSync(report, deps.journalDir);
  if (filepath) {
    process.stderr.write(`[rank-sync] Failure report saved: ${filepath}\n`);
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => interrupt('SIGINT', 130));
process.on('SIGTERM', () => interrupt('SIGTERM', 143));

runCli(process.argv.slice(2), deps, progress)
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    process.stderr.write(`[rank-sync] Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
    if (error instanceof Error && error.stack) {
      process.stderr.write(`[rank-sync] Stack: ${error.stack}\n`);
    }
    process.exit(1);
  });
