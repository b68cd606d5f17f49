import { isMap, isNode, isScalar, parseDocument } from 'yaml';
import type { z } from 'zod';
import { FixtureError, FixtureErrorCodes } from '../shared/types';
import type { NamedRecords, RecordDecoder } from '../shared/types';

function decodeFailure(message: string, label?: string, cause?: unknown): FixtureError {
  return new FixtureError({
    code: FixtureErrorCodes.DECODE_FAILED,
    message,
    context: label === undefined ? {} : { label },
    cause,
  });
}

/**
 * Decode a YAML document whose top level maps labels to records.
 *
 * Labels keep file order, including numeric-looking ones (`1200:`), and are
 * always returned as strings. Duplicate labels are a decode failure.
 */
export function decodeYamlMapping(text: string): NamedRecords<unknown> {
  const doc = parseDocument(text);

  if (doc.errors.length > 0) {
    const first = doc.errors[0];
    throw decodeFailure(`invalid YAML: ${first.message}`, undefined, first);
  }

  const records: NamedRecords<unknown> = new Map();
  if (doc.contents === null) return records;

  if (!isMap(doc.contents)) {
    throw decodeFailure('fixture file must be a YAML mapping of label to record');
  }

  for (const pair of doc.contents.items) {
    if (!isScalar(pair.key)) {
      throw decodeFailure('record labels must be scalar values');
    }
    const label = String(pair.key.value);
    const value: unknown = isNode(pair.value) ? pair.value.toJS(doc) : null;
    records.set(label, value);
  }

  return records;
}

/**
 * Build a decoder that validates every record against `schema`.
 * The first record that fails validation aborts the decode.
 */
export function createYamlDecoder<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): RecordDecoder<T> {
  return (text) => {
    const decoded = new Map<string, T>();
    for (const [label, raw] of decodeYamlMapping(text)) {
      const result = schema.safeParse(raw);
      if (!result.success) {
        const issues = result.error.issues
          .map((issue) => `${issue.path.join('.') || '(record)'}: ${issue.message}`)
          .join('; ');
        throw decodeFailure(`record \`${label}\` is invalid: ${issues}`, label, result.error);
      }
      decoded.set(label, result.data);
    }
    return decoded;
  };
}
