import fs from 'fs';
import os from 'os';
import path from 'path';
import { appendEvent, getRunStatus, makeEvent } from '../src/ledger/ledger';
import { readRunArtifact, readRunEvents, writeRunArtifact } from '../src/ledger/storage';

describe('run ledger', () => {
  const outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'run-ledger-'));

  afterAll(() => fs.rmSync(outDir, { recursive: true, force: true }));

  it('is unknown before any event', () => {
    expect(getRunStatus(outDir, 'never')).toBe('UNKNOWN');
    expect(readRunEvents(outDir, 'never')).toEqual([]);
  });

  it('tracks a run through its events', () => {
    appendEvent(outDir, makeEvent('run-a', 'RUN_STARTED', { strategy: 'Hold' }));
    expect(getRunStatus(outDir, 'run-a')).toBe('IN_PROGRESS');
    appendEvent(outDir, makeEvent('run-a', 'DAY_SKIPPED', { date: '2024-01-02' }));
    appendEvent(outDir, makeEvent('run-a', 'RUN_COMPLETED'));
    expect(getRunStatus(outDir, 'run-a')).toBe('COMPLETED');

    const events = readRunEvents(outDir, 'run-a');
    expect(events.map((e) => e.type)).toEqual(['RUN_STARTED', 'DAY_SKIPPED', 'RUN_COMPLETED']);
    expect(events[0].details).toEqual({ strategy: 'Hold' });
    expect(new Set(events.map((e) => e.id)).size).toBe(3);
  });

  it('reports failed runs', () => {
    appendEvent(outDir, makeEvent('run-b', 'RUN_STARTED'));
    appendEvent(outDir, makeEvent('run-b', 'RUN_FAILED', { error: 'boom' }));
    expect(getRunStatus(outDir, 'run-b')).toBe('FAILED');
  });

  it('rejects malformed event lines', () => {
    appendEvent(outDir, makeEvent('run-c', 'RUN_STARTED'));
    const file = path.join(outDir, 'run-c', 'events.jsonl');
    fs.appendFileSync(file, `${JSON.stringify({ id: 'x', runId: 'run-c', type: 'SOMETHING' })}\n`);
    expect(() => readRunEvents(outDir, 'run-c')).toThrow(`Malformed event on line 2 of ${file}`);
  });

  it('round-trips JSON artifacts', () => {
    writeRunArtifact(outDir, 'run-d', 'summary.json', { finalValue: 101.5 });
    expect(readRunArtifact(outDir, 'run-d', 'summary.json')).toEqual({ finalValue: 101.5 });
    expect(readRunArtifact(outDir, 'run-d', 'missing.json')).toBeUndefined();
  });
});
