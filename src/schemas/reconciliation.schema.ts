import { z } from 'zod';
import { companyScopeSchema } from './ledger.schema';

export { companyScopeSchema };

export const matchDecisionSchema = z.object({
  uid: z.string().trim().min(1, 'uid is required'),
  confirmedBy: z.string().trim().min(1).max(100).optional(),
});

export type MatchDecision = z.infer<typeof matchDecisionSchema>;

export const runIdParamsSchema = z.object({
  runId: z.string().uuid('Invalid run ID format'),
});

export const uidParamsSchema = z.object({
  uid: z.string().trim().min(1),
});

export const listRunsSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
