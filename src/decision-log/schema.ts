/**
 * zod shapes for reading decision log entries back from disk
 */

import { z } from 'zod';

const ClassificationSchema = z.object({
  domain: z.string(),
  action: z.string(),
  confidence: z.number(),
  reasoning: z.string(),
  source: z.enum(['classifier', 'heuristic', 'fallback']),
});

const QueryFeaturesSchema = z.object({
  tokenEstimate: z.number(),
  complexity: z.number(),
  hasCode: z.boolean(),
  codeLines: z.number(),
  domainIndicators: z.array(z.string()),
  needsTools: z.boolean(),
  conversationDepth: z.number(),
  ambiguity: z.number(),
});

const CandidateScoreSchema = z.object({
  modelId: z.string(),
  executorId: z.string(),
  probability: z.number(),
  cost: z.number(),
  weightedScore: z.number(),
  priority: z.number(),
  policyRank: z.number(),
  abilityMissing: z.boolean(),
  explanation: z.string(),
});

export const DecisionOutcomeSchema = z.object({
  success: z.boolean(),
  latencyMs: z.number().optional(),
  error: z.string().optional(),
  recordedAt: z.string(),
});

export const DecisionRecordSchema = z.object({
  id: z.string(),
  requestId: z.string(),
  attempt: z.number().int(),
  prompt: z.string(),
  classification: ClassificationSchema,
  features: QueryFeaturesSchema,
  candidates: z.array(z.string()),
  scores: z.array(CandidateScoreSchema),
  excluded: z.array(z.string()),
  selectedModel: z.string().nullable(),
  executorId: z.string().nullable(),
  fallbackClassification: z.boolean(),
  policyMatch: z.enum(['exact', 'domain', 'default', 'none']),
  stalePolicy: z.boolean(),
  snapshotVersion: z.number(),
  createdAt: z.string(),
  decidedAt: z.string(),
  latencyMs: z.number(),
  error: z.string().optional(),
  outcome: DecisionOutcomeSchema.optional(),
});

export const DecisionLogEntrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('decision'), record: DecisionRecordSchema }),
  z.object({ type: z.literal('outcome'), decisionId: z.string(), outcome: DecisionOutcomeSchema }),
]);
