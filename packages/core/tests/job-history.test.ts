import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createDatabase } from '../src/db/client.js';
import { JobHistory } from '../src/job-history.js';
import type { Job } from '../src/types.js';

function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    correlationId: 'c-1',
    originChat: 42,
    attachment: { kind: 'document', fileName: 'report.pdf', size: 5_242_880 },
    state: 'completed',
    attemptCount: 1,
    createdAt: Date.UTC(2025, 0, 1, 12, 0, 0),
    lastUpdateAt: Date.UTC(2025, 0, 1, 12, 0, 30),
    result: { link: 'https://gofile.io/d/abc', fileName: 'report.pdf' },
    ...overrides,
  };
}

describe('JobHistory', () => {
  let dir: string;
  let history: JobHistory;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'history-test-'));
    history = new JobHistory(createDatabase(join(dir, 'test.db')));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('records a completed job', () => {
    history.record(makeJob());

    expect(history.get('c-1')).toEqual({
      correlationId: 'c-1',
      originChat: 42,
      attachmentKind: 'document',
      fileName: 'report.pdf',
      fileSize: 5_242_880,
      state: 'completed',
      failureKind: null,
      failureMessage: null,
      link: 'https://gofile.io/d/abc',
      attemptCount: 1,
      createdAt: '2025-01-01T12:00:00.000Z',
      settledAt: '2025-01-01T12:00:30.000Z',
    });
  });

  it('records the failure of a failed job', () => {
    history.record(
      makeJob({
        state: 'failed',
        result: undefined,
        failure: { kind: 'upstream_store', message: 'HTTP 502' },
      }),
    );

    const row = history.get('c-1');
    expect(row?.state).toBe('failed');
    expect(row?.failureKind).toBe('upstream_store');
    expect(row?.failureMessage).toBe('HTTP 502');
    expect(row?.link).toBeNull();
  });

  it('overwrites the row when the same id settles again', () => {
    history.record(makeJob({ state: 'failed', result: undefined, failure: { kind: 'timeout', message: 'x' } }));
    history.record(makeJob({ lastUpdateAt: Date.UTC(2025, 0, 1, 13, 0, 0) }));

    const row = history.get('c-1');
    expect(row?.state).toBe('completed');
    expect(row?.failureKind).toBeNull();
    expect(row?.settledAt).toBe('2025-01-01T13:00:00.000Z');
  });

  it('lists the most recently settled jobs first', () => {
    history.record(makeJob({ correlationId: 'old', lastUpdateAt: Date.UTC(2025, 0, 1) }));
    history.record(makeJob({ correlationId: 'new', lastUpdateAt: Date.UTC(2025, 0, 3) }));
    history.record(makeJob({ correlationId: 'mid', lastUpdateAt: Date.UTC(2025, 0, 2) }));

    expect(history.recent(2).map((r) => r.correlationId)).toEqual(['new', 'mid']);
  });

  it('returns undefined for unknown ids', () => {
    expect(history.get('missing')).toBeUndefined();
  });
});
