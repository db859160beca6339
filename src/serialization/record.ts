/**
 * Conversion between evaluation inputs and the persisted record document.
 */

import { PersistenceError } from '../errors.js';
import type {
  EvaluationRecord,
  LLMTestCase,
  MetricDescriptor,
  MetricResults,
  ResultOrigin,
} from '../types.js';
import { metricName } from '../types.js';
import { type ParsedRecordDocument, recordDocumentSchema, type TestCaseDocument } from './schema.js';

/**
 * The JSON document written by every backend.
 */
export interface RecordDocument {
  test_cases: TestCaseDocument[];
  metrics: string[];
  results: MetricResults;
  timestamp: number;
  test_type?: string;
  test_file?: string;
  test_subject?: string;
}

export interface RecordInput {
  testCases: LLMTestCase[];
  metrics: MetricDescriptor[];
  results: MetricResults;
  timestamp: number;
  origin?: ResultOrigin | null;
}

/**
 * Reduce a test case to a plain snake_case field mapping. Absent fields are omitted.
 */
export function serializeTestCase(tc: LLMTestCase): TestCaseDocument {
  const doc: TestCaseDocument = { input: tc.input };
  if (tc.name != null) doc.name = tc.name;
  if (tc.actualOutput != null) doc.actual_output = tc.actualOutput;
  if (tc.expectedOutput != null) doc.expected_output = tc.expectedOutput;
  if (tc.context != null) doc.context = [...tc.context];
  if (tc.retrievalContext != null) doc.retrieval_context = [...tc.retrievalContext];
  return doc;
}

export function deserializeTestCase(doc: TestCaseDocument): LLMTestCase {
  const tc: LLMTestCase = { input: doc.input };
  if (doc.name != null) tc.name = doc.name;
  if (doc.actual_output != null) tc.actualOutput = doc.actual_output;
  if (doc.expected_output != null) tc.expectedOutput = doc.expected_output;
  if (doc.context != null) tc.context = doc.context;
  if (doc.retrieval_context != null) tc.retrievalContext = doc.retrieval_context;
  return tc;
}

/**
 * Build the document for one save. Throws PersistenceError when the inputs
 * cannot form a valid record; no I/O has happened at that point.
 */
export function buildRecordDocument(input: RecordInput): RecordDocument {
  const { testCases, results } = input;
  if (testCases.length === 0) {
    throw new PersistenceError('Cannot save results without any test cases');
  }

  const names = input.metrics.map(metricName);
  for (const name of names) {
    const outcomes = results[name];
    if (outcomes === undefined) {
      throw new PersistenceError(`No results given for metric '${name}'`);
    }
    if (outcomes.length !== testCases.length) {
      throw new PersistenceError(
        `Metric '${name}' has ${outcomes.length} results for ${testCases.length} test cases`,
      );
    }
  }

  for (const [name, outcomes] of Object.entries(results)) {
    for (const outcome of outcomes) {
      if (!Number.isFinite(outcome.score)) {
        throw new PersistenceError(`Metric '${name}' has a non-finite score: ${outcome.score}`);
      }
    }
  }

  const doc: RecordDocument = {
    test_cases: testCases.map(serializeTestCase),
    metrics: names,
    results,
    timestamp: input.timestamp,
  };

  if (input.origin) {
    doc.test_type = input.origin.testType;
    doc.test_file = input.origin.testFile;
    doc.test_subject = input.origin.testSubject;
  }

  return doc;
}

export function stringifyRecordDocument(doc: RecordDocument): string {
  return `${JSON.stringify(doc, null, 2)}\n`;
}

/**
 * Validate a parsed document and convert it into an EvaluationRecord.
 */
export function parseRecordDocument(data: unknown, resultId: string): EvaluationRecord {
  const parsed = recordDocumentSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new PersistenceError(`Malformed result record '${resultId}': ${issues}`);
  }
  return toRecord(parsed.data, resultId);
}

/**
 * Parse JSON text into an EvaluationRecord.
 */
export function parseRecordText(text: string, resultId: string): EvaluationRecord {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    const error = e instanceof Error ? e : new Error(String(e));
    throw new PersistenceError(`Result record '${resultId}' is not valid JSON: ${error.message}`, {
      cause: error,
    });
  }
  return parseRecordDocument(data, resultId);
}

function toRecord(doc: ParsedRecordDocument, resultId: string): EvaluationRecord {
  const hasOrigin =
    doc.test_type !== undefined || doc.test_file !== undefined || doc.test_subject !== undefined;

  return {
    resultId,
    testCases: doc.test_cases.map(deserializeTestCase),
    metricNames: doc.metrics,
    results: doc.results,
    timestamp: doc.timestamp,
    origin: hasOrigin
      ? {
          testFile: doc.test_file ?? 'unknown',
          testType: doc.test_type ?? 'unknown',
          testSubject: doc.test_subject ?? 'unknown',
        }
      : null,
  };
}
