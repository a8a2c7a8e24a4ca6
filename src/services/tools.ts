import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import type { Candidate, Snapshot } from '../types.js';
import type { GetSnapshotArgs, LookupCodeArgs } from '../schemas/tools.js';
import type { StateStore } from './stateStore.js';

export class ToolError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export type SnapshotView = Omit<Snapshot, 'candidates' | 'activityLog'> & {
  candidates: Candidate[];
  activityLog: Snapshot['activityLog'];
  matched: number;
};

export type LookupResult = {
  code: string;
  seen: boolean;
  candidate: Candidate | null;
};

/**
 * Parse raw tool arguments, mapping validation failures to InvalidParams.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join('.') || 'arguments'}: ${i.message}`).join('; ');
    throw new ToolError(message, ErrorCode.InvalidParams, parsed.error.issues);
  }
  return parsed.data;
}

export function querySnapshot(store: StateStore, args: GetSnapshotArgs): SnapshotView {
  const snapshot = store.snapshot();
  const matching = snapshot.candidates.filter((c) => c.confidence >= args.minConfidence);
  return {
    counters: snapshot.counters,
    sources: snapshot.sources,
    lastPoll: snapshot.lastPoll,
    activityLog: snapshot.activityLog.slice(0, 20),
    candidates: matching.slice(0, args.limit),
    matched: matching.length,
  };
}

export function lookupCode(store: StateStore, args: LookupCodeArgs): LookupResult {
  const code = args.code.toUpperCase();
  return {
    code,
    seen: store.isSeen(code),
    // an evicted candidate stays seen but is no longer retained
    candidate: store.findCandidate(code) ?? null,
  };
}

export function formatSnapshotSummary(view: SnapshotView): string {
  const lines = [
    `Invite Hunter: ${view.counters.totalCandidates} candidates, ${view.counters.uniqueCodes} unique codes`,
    `Last poll: ${view.lastPoll ?? 'not yet'}`,
    ...view.candidates.map((c) => `${c.code} (${c.confidence.toFixed(2)}) ${c.sourceTitle}`),
  ];
  return lines.join('\n');
}

export function formatLookup(result: LookupResult): string {
  if (result.candidate) {
    return `${result.code}: found via ${result.candidate.sourceTitle} at ${result.candidate.discoveredAt}`;
  }
  return result.seen ? `${result.code}: seen earlier, no longer retained` : `${result.code}: not seen`;
}
