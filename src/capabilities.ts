/**
 * The closed set of modes a pod may request. Validation, injection and config
 * rendering all go through this registry, so a mode cannot be accepted without
 * an injector behind it.
 */

import { MODE_ANNOTATION } from './constants.js';
import { ValidationError } from './errors.js';
import { helperInjector } from './helper.js';
import type { Injector } from './plan.js';
import { proxyInjector } from './proxy.js';

export const CAPABILITIES = {
  helper: helperInjector,
  proxy: proxyInjector,
} as const satisfies Record<string, Injector>;

export type CapabilityName = keyof typeof CAPABILITIES;

export const CAPABILITY_NAMES = Object.keys(CAPABILITIES).filter(isCapabilityName);

export function isCapabilityName(token: string): token is CapabilityName {
  return Object.prototype.hasOwnProperty.call(CAPABILITIES, token);
}

/**
 * Validates mode tokens against the registry. Any unknown token rejects the whole
 * list; valid tokens come back deduplicated in declaration order.
 */
export function resolveCapabilities(tokens: readonly string[], rawValue = tokens.join(',')): CapabilityName[] {
  const invalid = tokens.filter((token) => !isCapabilityName(token));
  if (invalid.length > 0) {
    const unique = [...new Set(invalid)];
    throw new ValidationError(
      `invalid value ${JSON.stringify(rawValue)} for annotation ${JSON.stringify(MODE_ANNOTATION)}: ` +
        `unrecognized mode(s) ${unique.map((t) => JSON.stringify(t)).join(', ')}; ` +
        `allowed values are ${CAPABILITY_NAMES.map((n) => JSON.stringify(n)).join(', ')}`,
      MODE_ANNOTATION,
      rawValue,
      unique,
      CAPABILITY_NAMES
    );
  }
  return [...new Set(tokens.filter(isCapabilityName))];
}
