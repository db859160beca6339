/**
 * Result identifier generation.
 *
 * Two strategies:
 * - `opaque` (default): `{timestamp}-{uuid}`, unique without any caller context.
 * - `descriptive`: `{testFile}-{testType}-{testSubject}-{timestamp}`, traceable back
 *   to the test that produced the record. Labels are best-effort and fall back to
 *   `unknown`.
 *
 * Both forms are used verbatim as file stems.
 */

import { randomUUID } from 'node:crypto';
import { basename } from 'node:path';
import type { LLMTestCase, ResultOrigin } from '../types.js';

export type IdStrategy = 'opaque' | 'descriptive';

export const UNKNOWN_LABEL = 'unknown';

/**
 * Longest label kept in a descriptive id. Three labels, the timestamp and the
 * `.json` extension stay well under the 255-byte file name limit.
 */
export const MAX_LABEL_LENGTH = 64;

const TEST_FILE_PATTERN = /\.(?:test|spec)\.[cm]?[jt]sx?$/;
const FRAME_LOCATION_PATTERN = /\(?((?:file:\/\/)?[^\s()]+?):\d+(?::\d+)?\)?$/;

export interface GeneratedId {
  resultId: string;
  /** Context labels, set only for descriptive ids. */
  origin: ResultOrigin | null;
}

export interface IdOptions {
  /** Explicit labels; anything not given is derived from the call stack and test cases. */
  origin?: Partial<ResultOrigin>;
  /** Stack trace to inspect instead of the current one. */
  stack?: string;
}

/**
 * Replace everything outside `[A-Za-z0-9_.-]` so a label can sit inside a file name,
 * and cut it to `MAX_LABEL_LENGTH` characters.
 */
export function toPathSafeLabel(label: string | null | undefined): string {
  const trimmed = (label ?? '').trim();
  if (!trimmed) return UNKNOWN_LABEL;
  const safe = trimmed.replace(/[^A-Za-z0-9_.-]/g, '_').slice(0, MAX_LABEL_LENGTH);
  // a label of only dots would read as a relative path segment
  return /^\.+$/.test(safe) ? safe.replace(/\./g, '_') : safe;
}

export function opaqueResultId(timestamp: number): string {
  return `${timestamp}-${randomUUID()}`;
}

export function descriptiveResultId(origin: ResultOrigin, timestamp: number): string {
  return `${origin.testFile}-${origin.testType}-${origin.testSubject}-${timestamp}`;
}

/**
 * Find the first test source file on a stack trace.
 */
export function originFromStack(
  stack: string | undefined,
): Pick<ResultOrigin, 'testFile' | 'testType'> {
  for (const line of (stack ?? '').split('\n')) {
    const match = FRAME_LOCATION_PATTERN.exec(line.trim());
    if (!match?.[1]) continue;

    const path = match[1];
    if (path.includes('/node_modules/')) continue;

    const file = basename(path);
    let stem: string | null = null;
    if (TEST_FILE_PATTERN.test(file)) {
      stem = file.replace(TEST_FILE_PATTERN, '');
    } else if (file.startsWith('test_')) {
      stem = file.replace(/\.[^.]+$/, '');
    }
    if (stem === null) continue;

    return {
      testFile: toPathSafeLabel(stem),
      testType: path.includes('integration') ? 'integration' : 'unit',
    };
  }
  return { testFile: UNKNOWN_LABEL, testType: UNKNOWN_LABEL };
}

/**
 * Work out the context labels for a descriptive id.
 */
export function describeOrigin(testCases: LLMTestCase[], opts?: IdOptions): ResultOrigin {
  const given = opts?.origin ?? {};
  const needsStack = given.testFile === undefined || given.testType === undefined;
  const fromStack = needsStack
    ? originFromStack(opts?.stack ?? new Error().stack)
    : { testFile: UNKNOWN_LABEL, testType: UNKNOWN_LABEL };

  return {
    testFile: toPathSafeLabel(given.testFile ?? fromStack.testFile),
    testType: toPathSafeLabel(given.testType ?? fromStack.testType),
    testSubject: toPathSafeLabel(given.testSubject ?? testCases[0]?.name),
  };
}

/**
 * Produces result ids for one storage root.
 */
export class ResultIdGenerator {
  readonly strategy: IdStrategy;

  constructor(strategy: IdStrategy = 'opaque') {
    this.strategy = strategy;
  }

  /**
   * Resolve the context labels once per save. Returns null for opaque ids.
   */
  originFor(testCases: LLMTestCase[], opts?: IdOptions): ResultOrigin | null {
    return this.strategy === 'descriptive' ? describeOrigin(testCases, opts) : null;
  }

  generate(timestamp: number, origin: ResultOrigin | null): string {
    if (this.strategy === 'descriptive') {
      return descriptiveResultId(
        origin ?? { testFile: UNKNOWN_LABEL, testType: UNKNOWN_LABEL, testSubject: UNKNOWN_LABEL },
        timestamp,
      );
    }
    return opaqueResultId(timestamp);
  }

  next(timestamp: number, testCases: LLMTestCase[], opts?: IdOptions): GeneratedId {
    const origin = this.originFor(testCases, opts);
    return { resultId: this.generate(timestamp, origin), origin };
  }
}
