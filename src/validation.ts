/**
 * Structural validation of the untrusted pod in request.object.
 * Only the parts the injectors touch are checked; anything else is passed through.
 * Throws DecodeError with the offending field path.
 */

import { DecodeError } from './errors.js';
import type { Container, EnvVar, Pod, Volume, VolumeMount } from './types.js';

type Guard<T> = (value: unknown, field: string) => value is T;

function assert(condition: boolean, message: string, field?: string): asserts condition {
  if (!condition) {
    throw new DecodeError(message, field);
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNamed(value: unknown): value is Record<string, unknown> & { name: string } {
  return isRecord(value) && typeof value.name === 'string' && value.name !== '';
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

/** Checks every item of an optional array; returns undefined when the field is absent. */
function checkArray<T>(value: unknown, field: string, guard: Guard<T>, what: string): T[] | undefined {
  if (value === undefined) return undefined;
  assert(Array.isArray(value), `${field} must be an array`, field);
  const items: unknown[] = value;
  const checked: T[] = [];
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    assert(guard(item, `${field}[${i}]`), `${field}[${i}] is not a valid ${what}`, `${field}[${i}]`);
    checked.push(item);
  }
  return checked;
}

function isEnvVar(value: unknown): value is EnvVar {
  return isNamed(value) && (value.value === undefined || typeof value.value === 'string');
}

function isVolumeMount(value: unknown): value is VolumeMount {
  return (
    isNamed(value) &&
    typeof value.mountPath === 'string' &&
    (value.readOnly === undefined || typeof value.readOnly === 'boolean')
  );
}

function isVolume(value: unknown): value is Volume {
  return isNamed(value);
}

/**
 * Checks the fields the injectors read or extend: name, env and volumeMounts.
 * Ports, securityContext, probes and everything else are passed through as
 * received, unverified; the API server validates them.
 */
function isContainer(value: unknown, field: string): value is Container {
  if (!isNamed(value)) return false;
  checkArray(value.env, `${field}.env`, isEnvVar, 'env var');
  checkArray(value.volumeMounts, `${field}.volumeMounts`, isVolumeMount, 'volume mount');
  return true;
}

/**
 * Validates `value` as a pod and returns it typed. The caller passes a working copy;
 * nested objects are shared with it, not cloned.
 */
export function decodePod(value: unknown): Pod {
  assert(isRecord(value), 'object must be a JSON object', 'object');
  const { metadata, spec } = value;

  assert(isRecord(metadata), 'Invalid Pod: missing metadata', 'metadata');
  const { annotations } = metadata;
  assert(
    annotations === undefined || isStringMap(annotations),
    'metadata.annotations must map strings to strings',
    'metadata.annotations'
  );

  assert(isRecord(spec), 'Invalid Pod: missing spec', 'spec');
  const containers = checkArray(spec.containers, 'spec.containers', isContainer, 'container');
  assert(containers !== undefined, 'spec.containers must be an array', 'spec.containers');
  const initContainers = checkArray(spec.initContainers, 'spec.initContainers', isContainer, 'container');
  const volumes = checkArray(spec.volumes, 'spec.volumes', isVolume, 'volume');

  return {
    ...value,
    metadata: { ...metadata, ...(annotations && { annotations }) },
    spec: {
      ...spec,
      containers,
      ...(initContainers && { initContainers }),
      ...(volumes && { volumes }),
    },
  };
}
