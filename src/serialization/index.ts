export type { RecordDocument, RecordInput } from './record.js';
export {
  buildRecordDocument,
  deserializeTestCase,
  parseRecordDocument,
  parseRecordText,
  serializeTestCase,
  stringifyRecordDocument,
} from './record.js';
export type { ParsedRecordDocument, TestCaseDocument } from './schema.js';
export {
  metricOutcomeSchema,
  recordDocumentSchema,
  saveResponseSchema,
  testCaseSchema,
} from './schema.js';
