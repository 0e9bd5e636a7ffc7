/**
 * Annotation-based opt-in. Every flag is compared against the exact string "true";
 * "True", "1" or "yes" leave the flag off.
 */

import {
  DEBUG_ANNOTATION,
  ENABLED_ANNOTATION,
  INCLUDE_INTERMEDIATE_ANNOTATION,
  MODE_ANNOTATION,
} from './constants.js';

export interface Gate {
  enabled: boolean;
  /** Raw mode tokens in declaration order; validated later against the capability registry. */
  modeTokens: string[];
  debugEnabled: boolean;
  includeIntermediateBundle: boolean;
}

type Annotations = Readonly<Record<string, string>> | undefined;

function isTrue(annotations: Annotations, key: string): boolean {
  return annotations?.[key] === 'true';
}

/**
 * Splits a comma-separated mode list. Tokens are trimmed and empty ones
 * (trailing or doubled commas) dropped; duplicates are kept here.
 */
export function parseModeTokens(value: string | undefined): string[] {
  if (value == null) return [];
  return value
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token !== '');
}

export function readGate(annotations: Annotations): Gate {
  return {
    enabled: isTrue(annotations, ENABLED_ANNOTATION),
    modeTokens: parseModeTokens(annotations?.[MODE_ANNOTATION]),
    debugEnabled: isTrue(annotations, DEBUG_ANNOTATION),
    includeIntermediateBundle: isTrue(annotations, INCLUDE_INTERMEDIATE_ANNOTATION),
  };
}
