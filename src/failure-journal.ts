// Failure journal: persistent, human-readable record of runs that stopped early.
//
// Design principles:
//   - Errors are data: a failed run becomes a structured record, not just an exit code
//   - Informational only: nothing ever reads a report back to resume a run
//   - Secrets stay out: reports carry messages and ids, never the config's credential
//
// Location: $RANK_SYNC_HOME/failures/ or ~/.group-rank-sync/failures/
//   failure-<timestamp>.json  — one file per failed run
//   LATEST.json               — copy of the most recent report

import { promises as fs, mkdirSync, writeFileSync } from 'fs';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { RANK_SYNC_ERROR_CODES, RankSyncError, type RankSyncErrorCode } from './errors.js';
import { realClock, type Clock } from './types.js';

/** A single failure report */
export interface FailureReport {
  readonly timestamp: string;         // ISO 8601
  readonly pid: number;
  readonly error: string;             // error message
  readonly stack?: string;
  readonly code: RankSyncErrorCode | 'unexpected';
  readonly context: FailureContext;
  readonly recovery: string[];        // human-readable recovery steps
}

/** What the run was doing when it stopped */
export interface FailureContext {
  readonly phase: 'startup' | 'resolving-roles' | 'syncing';
  readonly configPath?: string;
  readonly groupId?: number;
  readonly scannedRole?: string;
  readonly userId?: number;
  readonly assigned?: number;
}

const MAX_FAILURE_FILES = 20; // keep last 20 reports

const FailureReportSchema = z.object({
  timestamp: z.string(),
  pid: z.number(),
  error: z.string(),
  stack: z.string().optional(),
  code: z.union([z.enum(RANK_SYNC_ERROR_CODES), z.literal('unexpected')]),
  context: z.object({
    phase: z.enum(['startup', 'resolving-roles', 'syncing']),
    configPath: z.string().optional(),
    groupId: z.number().optional(),
    scannedRole: z.string().optional(),
    userId: z.number().optional(),
    assigned: z.number().optional(),
  }),
  recovery: z.array(z.string()),
});

/** Journal directory, honoring RANK_SYNC_HOME */
export function defaultJournalDir(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.RANK_SYNC_HOME ?? path.join(os.homedir(), '.group-rank-sync');
  return path.join(home, 'failures');
}

function reportFilename(report: FailureReport): string {
  return `failure-${report.timestamp.replace(/[:.]/g, '-')}.json`;
}

/** Write a report and refresh LATEST.json, pruning old reports. Returns the report's path. */
export async function writeFailureReport(report: FailureReport, dir: string = defaultJournalDir()): Promise<string> {
  await fs.mkdir(dir, { recursive: true });

  const filepath = path.join(dir, reportFilename(report));
  const content = JSON.stringify(report, null, 2);

  await fs.writeFile(filepath, content, 'utf-8');
  await fs.writeFile(path.join(dir, 'LATEST.json'), content, 'utf-8');

  await pruneOldReports(dir);
  return filepath;
}

/** Keep the newest MAX_FAILURE_FILES reports. Best-effort: a failure here only warns. */
async function pruneOldReports(dir: string): Promise<void> {
  try {
    const files = (await fs.readdir(dir))
      .filter(f => f.startsWith('failure-') && f.endsWith('.json'))
      .sort()
      .reverse();
    for (const old of files.slice(MAX_FAILURE_FILES)) {
      await fs.unlink(path.join(dir, old));
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[rank-sync] Could not prune old failure reports: ${message}\n`);
  }
}

/** Synchronous version for signal handlers, where pending promises may never settle */
export function writeFailureReportSync(report: FailureReport, dir: string = defaultJournalDir()): string | null {
  try {
    mkdirSync(dir, { recursive: true });
    const filepath = path.join(dir, reportFilename(report));
    const content = JSON.stringify(report, null, 2);
    writeFileSync(filepath, content, 'utf-8');
    writeFileSync(path.join(dir, 'LATEST.json'), content, 'utf-8');
    return filepath;
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    process.stderr.write(`[rank-sync] Could not write failure report: ${message}\n`);
    return null;
  }
}

/** Build a FailureReport from whatever ended the run */
export function buildFailureReport(
  error: unknown,
  context: FailureContext,
  clock: Clock = realClock,
): FailureReport {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;
  const code = error instanceof RankSyncError ? error.code : 'unexpected';

  return {
    timestamp: clock.isoNow(),
    pid: process.pid,
    error: message,
    stack,
    code,
    context,
    recovery: generateRecoverySteps(code, context),
  };
}

/** Generate human-readable recovery instructions based on the error code */
function generateRecoverySteps(code: FailureReport['code'], context: FailureContext): string[] {
  const steps: string[] = [];

  switch (code) {
    case 'config-file-not-provided':
      steps.push('Pass the path of a config file as the only argument.');
      break;

    case 'config-load':
      steps.push(`Check ${context.configPath ?? 'the config file'} for JSON syntax errors.`);
      steps.push('Verify groupId, scannedRoles, roleYearPairs and wildcardRole are present and well-typed.');
      steps.push('Make sure no year is listed under two roles.');
      break;

    case 'role-not-found':
      steps.push('Compare the role names in the config with the group\'s roles; matching is exact and case-sensitive.');
      steps.push('No member was changed: role resolution happens before any assignment.');
      break;

    case 'retry-limit-exceeded':
      steps.push('The platform kept failing for one member. Wait a few minutes and rerun.');
      steps.push('Consider raising behavior.cooldownSeconds or the attempt counts in the config.');
      break;

    case 'non-recoverable-platform':
      steps.push('If the error mentions the .ROBLOSECURITY cookie, log in again and replace it.');
      steps.push('Verify the account has permission to manage ranks in the group.');
      break;

    case 'malformed-creation-date':
      steps.push('The platform returned a creation date without a leading year. Rerun later or report the user id.');
      break;

    case 'interrupted':
      steps.push('The run was stopped by a signal. Members already processed keep their new rank.');
      break;

    case 'unexpected':
      steps.push('This is likely a bug in group-rank-sync. Check the stack trace for details.');
      break;
  }

  if (context.phase === 'syncing') {
    steps.push(`Rerunning starts over from the first scanned role; ${context.assigned ?? 0} assignment(s) completed before the failure.`);
  }

  return steps;
}

/** Read the most recent failure report; null when there is none or LATEST.json is not a report */
export async function readLatestFailure(dir: string = defaultJournalDir()): Promise<FailureReport | null> {
  let content: string;
  try {
    content = await fs.readFile(path.join(dir, 'LATEST.json'), 'utf-8');
  } catch (error: unknown) {
    const isFileNotFound = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (isFileNotFound) return null;
    throw error;
  }
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    return null;
  }
  const parsed = FailureReportSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/** Clear the latest-failure indicator after a run completes */
export async function clearLatestFailure(dir: string = defaultJournalDir()): Promise<void> {
  await fs.rm(path.join(dir, 'LATEST.json'), { force: true });
}

/** Format a failure report for stderr */
export function formatFailureReport(report: FailureReport): string {
  const lines: string[] = [
    `Rank sync failed (${report.code})`,
    `  When:  ${report.timestamp}`,
    `  Phase: ${report.context.phase}`,
    `  Error: ${report.error}`,
  ];

  if (report.context.scannedRole !== undefined) {
    lines.push(`  Scanning role: ${report.context.scannedRole}`);
  }
  if (report.context.userId !== undefined) {
    lines.push(`  Member in flight: ${report.context.userId}`);
  }

  lines.push('Recovery:');
  for (const step of report.recovery) {
    lines.push(`  - ${step}`);
  }

  return lines.join('\n');
}
