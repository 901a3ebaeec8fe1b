// Tests for cli.ts — argument handling, exit codes and journaling, with the
// platform replaced by ScriptedGroupApi and the journal in a temp directory.

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { runCli, type CliDeps } from '../cli.js';
import { buildFailureReport, readLatestFailure, writeFailureReport } from '../failure-journal.js';
import { RoleNotFoundError } from '../errors.js';
import type { Sensitive } from '../secret.js';
import type { RunProgress } from '../types.js';
import { ScriptedGroupApi, recordingReporter, recordingSleeper, steppingClock } from './helpers.js';

const CONFIG = {
  groupId: 1234,
  roblosecurity: 'test-secret',
  scannedRoles: ['Member'],
  roleYearPairs: { Vintage: [2006, 2007], Modern: [2020] },
  wildcardRole: 'Member',
};

describe('runCli', () => {
  let tempDir: string;
  let journalDir: string;
  let api: ScriptedGroupApi;
  let reporter: ReturnType<typeof recordingReporter>;
  let credentials: Sensitive<string>[];
  let deps: CliDeps;

  async function writeConfig(content: unknown): Promise<string> {
    const file = path.join(tempDir, 'config.json');
    await fs.writeFile(file, typeof content === 'string' ? content : JSON.stringify(content), 'utf-8');
    return file;
  }

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'rank-sync-cli-test-'));
    journalDir = path.join(tempDir, 'failures');
    api = new ScriptedGroupApi();
    reporter = recordingReporter();
    credentials = [];
    deps = {
      createApi: (credential) => {
        credentials.push(credential);
        return api;
      },
      sleeper: recordingSleeper(),
      clock: steppingClock('2026-05-06T07:08:09.000Z'),
      reporter,
      journalDir,
      env: {},
    };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('exits 1 with the usage message when no config path is given', async () => {
    const code = await runCli([], deps);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(reporter.notes, [
      'Please provide a config file as an argument. Usage: group-rank-sync <config_file>',
    ]);
    assert.strictEqual(credentials.length, 0);
    await assert.rejects(fs.access(journalDir), 'configuration errors are not journaled');
  });

  it('exits 1 on malformed JSON without calling the platform', async () => {
    const file = await writeConfig('{ not json');

    const code = await runCli([file], deps);

    assert.strictEqual(code, 1);
    assert.strictEqual(reporter.notes.length, 1);
    assert.ok(reporter.notes[0].startsWith(`Failed to load config ${file}: `));
    assert.deepStrictEqual(api.calls, []);
  });

  it('exits 0 after ranking every member and prints the summary', async () => {
    api.addPage(10, undefined, [101, 102])
      .addUser(101, '2006-04-01T00:00:00Z')
      .addUser(102, '2015-08-09T00:00:00Z');
    const file = await writeConfig(CONFIG);

    const code = await runCli([file], deps);

    assert.strictEqual(code, 0);
    assert.strictEqual(credentials[0].reveal(), 'test-secret');
    assert.deepStrictEqual(reporter.assignments, [
      { roleName: 'Vintage', userId: 101, year: 2006 },
      { roleName: 'Member', userId: 102, year: 2015 },
    ]);
    assert.strictEqual(reporter.notes[reporter.notes.length - 1], [
      'Sync complete: 2 members ranked in 0s',
      'Scanned:',
      '  - Member: 2',
      'Assigned:',
      '  - Vintage: 1',
      '  - Member: 1',
    ].join('\n'));
  });

  it('mentions the previous failure and clears it after a successful run', async () => {
    const previous = buildFailureReport(new RoleNotFoundError('Champion'), { phase: 'resolving-roles' }, steppingClock('2026-05-01T00:00:00.000Z'));
    await writeFailureReport(previous, journalDir);
    const file = await writeConfig(CONFIG);

    const code = await runCli([file], deps);

    assert.strictEqual(code, 0);
    assert.ok(reporter.notes.includes('Previous run failed at 2026-05-01T00:00:00.000Z (role-not-found): Role Champion not found'));
    assert.strictEqual(await readLatestFailure(journalDir), null);
  });

  it('journals a failed run and exits 1', async () => {
    const file = await writeConfig({ ...CONFIG, wildcardRole: 'Everyone' });

    const code = await runCli([file], deps);

    assert.strictEqual(code, 1);
    const latest = await readLatestFailure(journalDir);
    assert.strictEqual(latest?.code, 'role-not-found');
    assert.strictEqual(latest?.error, 'Role Everyone not found');
    assert.deepStrictEqual(latest?.context, {
      phase: 'resolving-roles',
      configPath: file,
      groupId: 1234,
      assigned: 0,
    });
    assert.strictEqual(
      reporter.notes[reporter.notes.length - 1],
      `Failure report saved: ${path.join(journalDir, 'failure-2026-05-06T07-08-09-000Z.json')}`,
    );
  });

  it('keeps progress current for the caller', async () => {
    api.addPage(10, undefined, [101, 102])
      .addUser(101, '2006-04-01T00:00:00Z')
      .addUser(102, 'garbage');
    const file = await writeConfig(CONFIG);
    const progress: RunProgress = { assigned: 0 };

    const code = await runCli([file], deps, progress);

    assert.strictEqual(code, 1);
    assert.deepStrictEqual(progress, { assigned: 1, scannedRole: 'Member', userId: 102 });
    const latest = await readLatestFailure(journalDir);
    assert.strictEqual(latest?.code, 'malformed-creation-date');
    assert.strictEqual(latest?.context.phase, 'syncing');
  });

  it('exits 0 after a completed run even when the journal cannot be touched', async () => {
    const blocker = path.join(tempDir, 'not-a-directory');
    await fs.writeFile(blocker, '', 'utf-8');
    api.addPage(10, undefined, [101]).addUser(101, '2006-04-01T00:00:00Z');
    const file = await writeConfig(CONFIG);

    const code = await runCli([file], { ...deps, journalDir: path.join(blocker, 'failures') });

    assert.strictEqual(code, 0);
    assert.deepStrictEqual(api.assignments, [{ userId: 101, roleId: 30 }]);
    assert.ok(reporter.notes.some(n => n.startsWith('Sync complete: 1 member ranked')));
    assert.ok(reporter.notes[reporter.notes.length - 1].startsWith('Could not clear the previous failure report: '));
  });

  it('keeps the run error and exit 1 when the report cannot be written', async () => {
    const blocker = path.join(tempDir, 'not-a-directory');
    await fs.writeFile(blocker, '', 'utf-8');
    const file = await writeConfig({ ...CONFIG, wildcardRole: 'Everyone' });

    const code = await runCli([file], { ...deps, journalDir: path.join(blocker, 'failures') });

    assert.strictEqual(code, 1);
    const notes = reporter.notes;
    assert.ok(notes[notes.length - 2].startsWith('Rank sync failed (role-not-found)'));
    assert.ok(notes[notes.length - 1].startsWith('Could not write failure report: '));
  });

  it('never writes the credential into the journal', async () => {
    const file = await writeConfig({ ...CONFIG, wildcardRole: 'Everyone' });

    await runCli([file], deps);

    const files = await fs.readdir(journalDir);
    for (const name of files) {
      const content = await fs.readFile(path.join(journalDir, name), 'utf-8');
      assert.ok(!content.includes('test-secret'), `${name} leaks the credential`);
    }
  });
});
