import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { StateStore } from '../src/services/stateStore.js';
import type { Candidate } from '../src/types.js';

const fixedNow = () => new Date('2024-05-01T12:00:00.000Z');

function candidate(code: string, confidence = 0.5): Candidate {
  return {
    code,
    exampleText: code,
    sourceTitle: 'Test',
    url: '',
    discoveredAt: '2024-05-01T12:00:00.000Z',
    confidence,
    sourceType: 'test',
  };
}

describe('StateStore', () => {
  it('lets only the first claim of a token win', () => {
    const store = new StateStore();
    expect(store.claim('AB12C3')).toBe(true);
    expect(store.claim('AB12C3')).toBe(false);
    expect(store.isSeen('AB12C3')).toBe(true);

    store.markSeen('ZZ99ZZ');
    expect(store.claim('ZZ99ZZ')).toBe(false);
  });

  it('returns candidates newest first and evicts the oldest past capacity', () => {
    const store = new StateStore({ maxCandidates: 2 });
    for (const code of ['AAA111', 'BBB222', 'CCC333']) {
      store.claim(code);
      store.appendCandidate(candidate(code));
    }
    const snap = store.snapshot();
    expect(snap.candidates.map((c) => c.code)).toEqual(['CCC333', 'BBB222']);
    expect(snap.counters.totalCandidates).toBe(2);
    expect(snap.counters.uniqueCodes).toBe(3);
    expect(store.findCandidate('aaa111')).toBeUndefined();
    expect(store.findCandidate(' bbb222 ')?.code).toBe('BBB222');
  });

  it('caps the activity log', () => {
    const store = new StateStore({ maxLogEntries: 2, now: fixedNow });
    store.appendLog('info', 'one');
    store.appendLog('debug', 'two');
    const last = store.appendLog('error', 'three');

    expect(last).toEqual({ timestamp: '2024-05-01T12:00:00.000Z', level: 'error', message: 'three' });
    expect(store.snapshot().activityLog.map((e) => e.message)).toEqual(['three', 'two']);
  });

  it('derives health from the latest success and failure', () => {
    const store = new StateStore();
    store.registerSource('Alpha', true);
    expect(store.snapshot().sources).toEqual([
      { name: 'Alpha', enabled: true, lastSuccess: null, lastError: null, healthy: false },
    ]);

    store.recordFailure('Alpha', '2024-01-01T00:00:00.000Z');
    expect(store.snapshot().sources[0].healthy).toBe(false);

    store.recordSuccess('Alpha', '2024-01-01T00:01:00.000Z');
    expect(store.snapshot().sources[0]).toEqual({
      name: 'Alpha',
      enabled: true,
      lastSuccess: '2024-01-01T00:01:00.000Z',
      lastError: '2024-01-01T00:00:00.000Z',
      healthy: true,
    });
    expect(store.snapshot().counters).toEqual({
      successCount: 1,
      errorCount: 1,
      totalCandidates: 0,
      uniqueCodes: 0,
    });
  });

  it('keeps registration idempotent while updating the enabled flag', () => {
    const store = new StateStore();
    store.registerSource('Alpha', true);
    store.recordSuccess('Alpha', '2024-01-01T00:00:00.000Z');
    store.registerSource('Alpha', false);
    expect(store.snapshot().sources).toEqual([
      { name: 'Alpha', enabled: false, lastSuccess: '2024-01-01T00:00:00.000Z', lastError: null, healthy: true },
    ]);
  });

  it('hands out frozen snapshots unaffected by later writes', () => {
    const store = new StateStore({ now: fixedNow });
    store.claim('AAA111');
    store.appendCandidate(candidate('AAA111'));
    const before = store.snapshot();

    store.claim('BBB222');
    store.appendCandidate(candidate('BBB222'));
    store.markPolled();

    expect(Object.isFrozen(before)).toBe(true);
    expect(Object.isFrozen(before.candidates)).toBe(true);
    expect(Object.isFrozen(before.candidates[0])).toBe(true);
    expect(before.candidates).toHaveLength(1);
    expect(before.lastPoll).toBeNull();
    expect(store.snapshot().lastPoll).toBe('2024-05-01T12:00:00.000Z');
  });

  it('mirrors activity entries to the logger', () => {
    const lines: string[] = [];
    const logger = pino({ level: 'debug', base: undefined }, { write: (msg: string) => lines.push(msg) });
    const store = new StateStore({ logger });

    store.appendLog('debug', 'quiet');
    store.appendLog('success', 'found AB12C3');
    store.appendLog('error', 'Alpha: boom');
    store.appendLog('info', 'cycle done');

    const records = lines.map((line) => JSON.parse(line));
    expect(records.map((r) => [r.level, r.msg])).toEqual([
      [20, 'quiet'],
      [30, 'found AB12C3'],
      [50, 'Alpha: boom'],
      [30, 'cycle done'],
    ]);
    expect(records[1].activity).toBe('success');
  });
});
