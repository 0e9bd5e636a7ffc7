/**
 * JSON Patch (RFC 6902) between the pod as received and the mutated working copy.
 * The API server applies the patch; we never return the full object.
 */

import jsonPatch from 'fast-json-patch';
import type { Operation } from 'fast-json-patch';
import { MarshalError, errorMessage } from './errors.js';

const { compare } = jsonPatch;

export type JsonPatchOp = Operation;

/** Serializes and re-parses `value`, dropping undefined fields the way the wire format does. */
export function marshal(value: unknown): unknown {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (err) {
    throw new MarshalError(`failed to marshal mutated pod: ${errorMessage(err)}`, { cause: err });
  }
  if (text === undefined) {
    throw new MarshalError('failed to marshal mutated pod: value is not serializable');
  }
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

function isDocument(value: unknown): value is object | unknown[] {
  return value !== null && typeof value === 'object';
}

/** Operations that turn `original` into `mutated`. Empty when they are equal. */
export function createPatch(original: unknown, mutated: unknown): JsonPatchOp[] {
  if (!isDocument(original) || !isDocument(mutated)) {
    throw new MarshalError('patch documents must be JSON objects');
  }
  return compare(original, mutated);
}

/** Base64 of the patch JSON, as AdmissionReview expects in response.patch. */
export function encodePatch(ops: readonly JsonPatchOp[]): string {
  return Buffer.from(JSON.stringify(ops), 'utf8').toString('base64');
}

/** Applies `ops` to a copy of `document` and returns the result. */
export function applyPatch(document: unknown, ops: readonly JsonPatchOp[]): unknown {
  return jsonPatch.applyPatch(structuredClone(document), [...ops], true, false).newDocument;
}
