import { z } from 'zod';
import { CLAIM_CATEGORIES } from '../verification/types.js';

const ClaimSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  category: z.enum(CLAIM_CATEGORIES),
  context: z.string().optional(),
}).strict();

const VerdictSchema = z.object({
  claimId: z.string().min(1),
  status: z.enum(['verified', 'false', 'unverifiable']),
  confidence: z.number().min(0).max(1),
  explanation: z.string(),
  sources: z.array(z.string()),
  evidenceConsidered: z.number().int().min(0),
  provider: z.string().optional(),
  queries: z.array(z.string()),
}).strict();

const ReliabilitySchema = z.enum(['high', 'medium', 'low']);
const ModeSchema = z.enum(['full', 'fast', 'statistic']);

export const ReportSchema = z.object({
  id: z.string().min(1),
  generatedAt: z.string().datetime(),
  originalText: z.string(),
  claims: z.array(ClaimSchema),
  verdicts: z.array(VerdictSchema),
  overallReliability: ReliabilitySchema,
  mode: ModeSchema,
  fingerprint: z.string(),
  noClaimsExtracted: z.boolean(),
}).strict().refine(r => r.claims.length === r.verdicts.length, {
  message: 'claims and verdicts differ in length',
});

export const ReportSummarySchema = z.object({
  id: z.string().min(1),
  generatedAt: z.string().datetime(),
  overallReliability: ReliabilitySchema,
  counts: z.object({
    verified: z.number().int().min(0),
    false: z.number().int().min(0),
    unverifiable: z.number().int().min(0),
    total: z.number().int().min(0),
  }),
  mode: ModeSchema,
  claimCount: z.number().int().min(0),
});

export const HistoryIndexSchema = z.object({
  version: z.literal(1),
  reports: z.array(ReportSummarySchema),
});

export type HistoryIndex = z.infer<typeof HistoryIndexSchema>;
