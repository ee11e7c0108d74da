import type { Verdict, VerdictFailure, VerdictKind } from './types.js';

export function createVerdict(fields: {
  kind: VerdictKind;
  sourceProviderId: string;
  rawText: string;
  latencyMs: number;
  failure?: VerdictFailure;
}): Verdict {
  const verdict: Verdict = fields.failure === undefined
    ? {
        kind: fields.kind,
        sourceProviderId: fields.sourceProviderId,
        rawText: fields.rawText,
        latencyMs: fields.latencyMs,
      }
    : { ...fields };
  return Object.freeze(verdict);
}

export function unparseableVerdict(
  sourceProviderId: string,
  failure: VerdictFailure,
  latencyMs: number,
  rawText = ''
): Verdict {
  return createVerdict({ kind: 'unparseable', sourceProviderId, rawText, latencyMs, failure });
}

export function isParseable(verdict: Verdict): boolean {
  return verdict.kind !== 'unparseable';
}
