/**
 * One admission pass over a pod: gate, validate modes, inject, marshal, diff.
 * The original object is never touched; all mutation happens on a structured clone.
 */

import { readGate } from './annotations.js';
import { CAPABILITIES, resolveCapabilities } from './capabilities.js';
import { MODE_ANNOTATION } from './constants.js';
import { AdmissionError, DecodeError, ValidationError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { createPatch, marshal } from './patch.js';
import type { JsonPatchOp } from './patch.js';
import { applyPlan } from './plan.js';
import type { InjectionContext, Injector } from './plan.js';
import type { InjectorOptions, Pod } from './types.js';
import { decodePod } from './validation.js';
import { debugUiInjector, identitySocketInjector } from './workload.js';

export type MutationOutcome =
  | { kind: 'allowed'; reason: string }
  | { kind: 'patched'; patch: JsonPatchOp[]; pod: Pod }
  | { kind: 'denied'; reason: string }
  | { kind: 'errored'; code: number; message: string };

export interface MutateOptions {
  options: Readonly<InjectorOptions>;
  logger: Logger;
  /** Bound to every log line of the pass (typically the request uid). */
  requestUid?: string;
}

function runInjector(injector: Injector, pod: Pod, context: InjectionContext): void {
  const logger = context.logger.child({ injector: injector.name });
  const changes = applyPlan(pod, injector.plan({ ...context, logger }), logger);
  logger.debug('Injector applied', { changes });
}

/**
 * Mutates a copy of `object` and returns the outcome. Never throws: decode failures
 * become 400s, invalid modes become denials and anything unexpected a 500.
 */
export function mutatePod(object: unknown, { options, logger: baseLogger, requestUid }: MutateOptions): MutationOutcome {
  let logger = baseLogger.child({ request: requestUid });

  let pod: Pod;
  try {
    pod = decodePod(structuredClone(object));
  } catch (err) {
    if (err instanceof DecodeError) {
      logger.error('Failed to decode pod', { error: err.message, field: err.field });
      return { kind: 'errored', code: err.code, message: err.message };
    }
    logger.error('Failed to copy pod', { error: errorMessage(err) });
    return { kind: 'errored', code: 400, message: errorMessage(err) };
  }

  logger = logger.child({ podNamespace: pod.metadata.namespace, podName: pod.metadata.name ?? pod.metadata.generateName });
  const annotations = pod.metadata.annotations;
  const gate = readGate(annotations);

  if (!gate.enabled) {
    logger.info('Skipping all injections, annotation not set or disabled');
    return { kind: 'allowed', reason: 'Injection criteria not met' };
  }

  try {
    const modes = resolveCapabilities(gate.modeTokens, annotations?.[MODE_ANNOTATION] ?? '');
    logger.info('Applying injections', { modes, debug: gate.debugEnabled });

    const context: InjectionContext = { gate, options, logger };
    if (gate.debugEnabled) {
      runInjector(debugUiInjector, pod, context);
    }
    runInjector(identitySocketInjector, pod, context);
    for (const mode of modes) {
      runInjector(CAPABILITIES[mode], pod, context);
    }

    const mutated = marshal(pod);
    const patch = createPatch(object, mutated);
    logger.info('Pod mutated', { operations: patch.length });
    return { kind: 'patched', patch, pod };
  } catch (err) {
    if (err instanceof ValidationError) {
      logger.warn('Pod rejected due to invalid annotation value', {
        annotation: err.annotation,
        value: err.value,
        invalid: err.invalidTokens,
      });
      return { kind: 'denied', reason: err.message };
    }
    const code = err instanceof AdmissionError ? err.code : 500;
    logger.error('Mutation failed', {
      error: errorMessage(err),
      errorName: err instanceof Error ? err.name : undefined,
      annotations,
    });
    return { kind: 'errored', code, message: errorMessage(err) };
  }
}
