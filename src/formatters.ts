// Console text for the rank sync.
//
// Pure functions — no side effects, no state. Each takes structured data
// and returns the line(s) to print.

import type { Assignment, SyncSummary } from './types.js';

/** The stdout progress line for one assignment */
export function formatAssignment(a: Assignment): string {
  return `Assigned role ${a.roleName} to user ${a.userId} (account age: ${a.year})`;
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  if (totalSeconds < 60) return `${totalSeconds}s`;
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes < 60) return `${minutes}m ${seconds}s`;
  return `${Math.floor(minutes / 60)}h ${minutes % 60}m`;
}

/** Multi-line end-of-run summary for stderr */
export function formatSummary(summary: SyncSummary): string {
  const lines = [
    `Sync complete: ${summary.assigned} ${summary.assigned === 1 ? 'member' : 'members'} ranked in ${formatDuration(summary.elapsedMs)}`,
  ];

  const scanned = Object.entries(summary.byScannedRole);
  if (scanned.length > 0) {
    lines.push('Scanned:');
    for (const [role, count] of scanned) lines.push(`  - ${role}: ${count}`);
  }

  const targets = Object.entries(summary.byTargetRole);
  if (targets.length > 0) {
    lines.push('Assigned:');
    for (const [role, count] of targets) lines.push(`  - ${role}: ${count}`);
  }

  return lines.join('\n');
}
