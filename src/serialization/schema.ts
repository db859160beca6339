/**
 * Zod schemas for the persisted record format.
 *
 * Documents use snake_case keys on disk and over the wire; the TypeScript
 * side works with camelCase `EvaluationRecord` values.
 */

import { z } from 'zod';

export const testCaseSchema = z.object({
  name: z.string().nullable().optional(),
  input: z.string(),
  actual_output: z.string().nullable().optional(),
  expected_output: z.string().nullable().optional(),
  context: z.array(z.string()).nullable().optional(),
  retrieval_context: z.array(z.string()).nullable().optional(),
});

export type TestCaseDocument = z.infer<typeof testCaseSchema>;

/**
 * Extra keys on an outcome are kept so a round trip never drops data.
 */
export const metricOutcomeSchema = z
  .object({
    score: z.number(),
    success: z.boolean(),
    reason: z.string().nullable().optional(),
    error: z.string().nullable().optional(),
    threshold: z.number().optional(),
  })
  .passthrough();

export const recordDocumentSchema = z.object({
  result_id: z.string().optional(),
  test_cases: z.array(testCaseSchema),
  metrics: z.array(z.string()),
  results: z.record(z.string(), z.array(metricOutcomeSchema)),
  timestamp: z.number().int(),
  test_type: z.string().optional(),
  test_file: z.string().optional(),
  test_subject: z.string().optional(),
});

export type ParsedRecordDocument = z.infer<typeof recordDocumentSchema>;

/**
 * Body returned by the remote service after a successful save.
 */
export const saveResponseSchema = z.object({
  result_id: z.string().min(1),
});
