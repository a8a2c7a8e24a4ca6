import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const CandidateSchema = z.object({
  code: z.string(),
  exampleText: z.string(),
  sourceTitle: z.string(),
  url: z.string(),
  discoveredAt: z.string(),
  confidence: z.number().min(0.1).max(1),
  sourceType: z.string(),
});

export const ActivityLogEntrySchema = z.object({
  timestamp: z.string(),
  level: z.enum(['info', 'debug', 'success', 'error']),
  message: z.string(),
});

export const SourceHealthSchema = z.object({
  name: z.string(),
  enabled: z.boolean(),
  lastSuccess: z.string().nullable(),
  lastError: z.string().nullable(),
  healthy: z.boolean(),
});

export const CodesPayloadSchema = z.object({
  query: z.string(),
  pollIntervalSeconds: z.number(),
  maxPostsPerSource: z.number(),
  lastPoll: z.string().nullable(),
  poller: z.object({
    phase: z.enum(['idle', 'fetching', 'processing', 'sleeping']),
    source: z.string().optional(),
  }),
  counters: z.object({
    successCount: z.number(),
    errorCount: z.number(),
    totalCandidates: z.number(),
    uniqueCodes: z.number(),
  }),
  candidates: z.array(CandidateSchema),
  activityLog: z.array(ActivityLogEntrySchema),
  sources: z.array(SourceHealthSchema),
});

export const codesPayloadJsonSchema = zodToJsonSchema(CodesPayloadSchema, 'CodesPayload');
