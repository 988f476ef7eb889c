/**
 * Auditor + report assembly tests
 *
 * Drive all four collectors through a stub runner and write
 * into temp directories.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { mkdtempSync, rmSync, readFileSync, readdirSync } from 'fs';
import { tmpdir } from 'os';
import { AuditContext } from '../src/core/context.js';
import { Auditor, generateReport } from '../src/core/auditor.js';
import { renderText } from '../src/report/text.js';
import { reportFileName } from '../src/report/writer.js';
import { METADATA_REACHABLE } from '../src/collectors/cloud.js';
import { formatFileTimestamp, formatTimestamp } from '../src/utils/time.js';
import type { CommandResult } from '../src/core/models.js';
import { audit } from '../src/index.js';
import { ok, stubRunner } from './stub-runner.js';

const NOW = new Date(2026, 9, 19, 14, 3, 7);

const WHO = 'alice    pts/0        2026-10-19 13:55 (10.0.0.5)';
const LAST = 'alice    pts/0        10.0.0.5         Mon Oct 19 13:55   still logged in';
const SS =
  'Netid State Recv-Q Send-Q Local Address:Port Peer Address:Port Process\n' +
  'tcp LISTEN 0 128 0.0.0.0:22 0.0.0.0:* users:(("sshd",pid=1,fd=3))';

const RESPONSES: Record<string, CommandResult> = {
  who: ok(WHO),
  last: ok(LAST),
  ss: ok(SS),
  curl: ok('ami-id'),
};

const EXPECTED_REPORT = [
  '=== System Security Audit Report ===',
  'Generated on: 2026-10-19 14:03:07',
  '========================================',
  '',
  '--- Active Users ---',
  WHO,
  '',
  '--- Last 10 Logins ---',
  LAST,
  '',
  '--- Listening Ports ---',
  '0.0.0.0:22' + ' '.repeat(21) + 'sshd',
  '',
  '--- Cloud Metadata Check ---',
  METADATA_REACHABLE,
  '',
].join('\n');

describe('timestamps', () => {
  it('formats a human readable local time', () => {
    expect(formatTimestamp(NOW)).toBe('2026-10-19 14:03:07');
  });

  it('formats a file-safe local time', () => {
    expect(formatFileTimestamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02_03-04-05');
  });

  it('names report files after the timestamp', () => {
    expect(reportFileName(NOW)).toBe('security_report_2026-10-19_14-03-07.txt');
    expect(reportFileName(NOW, 2)).toBe('security_report_2026-10-19_14-03-07_2.txt');
  });
});

describe('Auditor', () => {
  it('runs collectors in fixed order and keeps every present section', async () => {
    const { runner, run } = stubRunner(RESPONSES);
    const started: string[] = [];
    const ctx = new AuditContext({
      runner,
      now: () => NOW,
      callbacks: { onCollectorStart: (c) => started.push(c) },
    });

    const result = await new Auditor().run(ctx);

    expect(started).toEqual(['users', 'logins', 'ports', 'cloud']);
    expect(run.mock.calls.map(([argv]) => argv[0])).toEqual(['who', 'last', 'ss', 'curl']);
    expect(result.sections.map((s) => s.collector)).toEqual(['users', 'logins', 'ports', 'cloud']);
    expect(result.absent).toEqual([]);
    expect(result.generatedAt).toBe(NOW);
  });

  it('drops the section of a failed probe and carries on', async () => {
    const { runner } = stubRunner({ who: ok(''), ss: ok(SS), curl: ok('') });
    const onCollectorComplete = vi.fn();
    const ctx = new AuditContext({ runner, now: () => NOW, callbacks: { onCollectorComplete } });

    const result = await new Auditor().run(ctx);

    expect(result.absent).toEqual(['logins']);
    expect(result.sections.map((s) => s.header)).toEqual([
      '--- Active Users ---',
      '--- Listening Ports ---',
      '--- Cloud Metadata Check ---',
    ]);
    expect(result.sections[0].body).toBe('No active users found.');
    expect(onCollectorComplete).toHaveBeenCalledWith('logins', expect.any(Number), false);
    expect(onCollectorComplete).toHaveBeenCalledWith('users', expect.any(Number), true);
  });

  it('treats a collector that throws as absent and reports it', async () => {
    const { runner, run } = stubRunner(RESPONSES);
    run.mockImplementationOnce(() => {
      throw new Error('boom');
    });
    const reportError = vi.fn();
    const ctx = new AuditContext({ runner, now: () => NOW, reportError });

    const result = await new Auditor().run(ctx);

    expect(reportError).toHaveBeenCalledWith('Error: users probe failed: boom');
    expect(result.absent).toEqual(['users']);
    expect(result.sections).toHaveLength(3);
  });

  it('runs only the requested collectors', async () => {
    const { runner, run } = stubRunner(RESPONSES);
    const ctx = new AuditContext({ runner, collectors: ['ports'], now: () => NOW });

    const result = await new Auditor().run(ctx);

    expect(run).toHaveBeenCalledTimes(1);
    expect(result.sections.map((s) => s.collector)).toEqual(['ports']);
  });
});

describe('renderText', () => {
  it('renders only the header when no section is present', () => {
    const text = renderText({ generatedAt: NOW, sections: [], absent: ['users'], durationMs: 0 });

    expect(text).toBe(
      '=== System Security Audit Report ===\n' +
        'Generated on: 2026-10-19 14:03:07\n' +
        '========================================\n\n',
    );
  });
});

describe('generateReport', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'host-audit-report-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the assembled report to a timestamped file', async () => {
    const { runner } = stubRunner(RESPONSES);
    const ctx = new AuditContext({ runner, directory: dir, now: () => NOW });

    const outcome = await generateReport(ctx);

    expect(outcome.text).toBe(EXPECTED_REPORT);
    expect(outcome.path).toBe(join(dir, 'security_report_2026-10-19_14-03-07.txt'));
    expect(readFileSync(join(dir, 'security_report_2026-10-19_14-03-07.txt'), 'utf-8')).toBe(EXPECTED_REPORT);
  });

  it('never overwrites a report from the same second', async () => {
    const first = await generateReport(
      new AuditContext({ runner: stubRunner(RESPONSES).runner, directory: dir, now: () => NOW }),
    );
    const second = await generateReport(
      new AuditContext({ runner: stubRunner(RESPONSES).runner, directory: dir, now: () => NOW }),
    );

    expect(readdirSync(dir).sort()).toEqual([
      'security_report_2026-10-19_14-03-07.txt',
      'security_report_2026-10-19_14-03-07_1.txt',
    ]);
    expect(second.path).toBe(join(dir, 'security_report_2026-10-19_14-03-07_1.txt'));
    expect(readFileSync(join(dir, 'security_report_2026-10-19_14-03-07_1.txt'), 'utf-8')).toBe(first.text);
    expect(second.text).toBe(first.text);
  });

  it('reports a write failure without throwing', async () => {
    const missing = join(dir, 'missing');
    const reportError = vi.fn();
    const ctx = new AuditContext({
      runner: stubRunner(RESPONSES).runner,
      directory: missing,
      now: () => NOW,
      reportError,
    });

    const outcome = await generateReport(ctx);

    expect(outcome.path).toBeNull();
    expect(outcome.text).toBe(EXPECTED_REPORT);
    expect(reportError).toHaveBeenCalledTimes(1);
    expect(reportError.mock.calls[0][0]).toMatch(
      /^CRITICAL: Could not write report to .*missing\/security_report_2026-10-19_14-03-07\.txt: ENOENT/,
    );
  });
});

describe('audit', () => {
  it('runs every collector through the library entry point', async () => {
    const result = await audit({ runner: stubRunner(RESPONSES).runner, now: () => NOW });

    expect(result.sections.map((s) => s.header)).toEqual([
      '--- Active Users ---',
      '--- Last 10 Logins ---',
      '--- Listening Ports ---',
      '--- Cloud Metadata Check ---',
    ]);
    expect(renderText(result)).toBe(EXPECTED_REPORT);
  });
});
