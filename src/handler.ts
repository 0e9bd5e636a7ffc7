/**
 * AdmissionReview request/response handling.
 * Parses the envelope, runs the mutation pass and shapes the response; the patch
 * is JSON Patch, base64-encoded per the Kubernetes API.
 */

import type { Logger } from './logger.js';
import { rootLogger } from './logger.js';
import { mutatePod } from './mutate.js';
import { encodePatch } from './patch.js';
import type { AdmissionRequest, AdmissionReviewResponse, InjectorOptions } from './types.js';
import { ADMISSION_API_VERSION, ADMISSION_KIND, DEFAULT_INJECTOR_OPTIONS } from './types.js';
import { isRecord } from './validation.js';

function readRequest(body: unknown): AdmissionRequest | string {
  if (!isRecord(body) || !isRecord(body.request)) {
    return 'Invalid AdmissionReview: missing request';
  }
  const { uid, operation, resource, object, namespace, name } = body.request;
  if (typeof uid !== 'string' || uid === '') {
    return 'Invalid AdmissionReview: missing request.uid';
  }
  return {
    uid,
    object,
    ...(typeof namespace === 'string' && { namespace }),
    ...(typeof name === 'string' && { name }),
    ...((operation === 'CREATE' || operation === 'UPDATE' || operation === 'DELETE' || operation === 'CONNECT') && {
      operation,
    }),
    ...(isRecord(resource) &&
      typeof resource.resource === 'string' && {
        resource: {
          group: typeof resource.group === 'string' ? resource.group : '',
          version: typeof resource.version === 'string' ? resource.version : '',
          resource: resource.resource,
        },
      }),
  };
}

/**
 * Handle a single AdmissionReview request body and return the response body.
 */
export function handleAdmissionReview(
  body: unknown,
  options: Partial<InjectorOptions> = {},
  logger: Logger = rootLogger
): AdmissionReviewResponse {
  const opts: Readonly<InjectorOptions> = { ...DEFAULT_INJECTOR_OPTIONS, ...options };
  const response: AdmissionReviewResponse = {
    apiVersion: ADMISSION_API_VERSION,
    kind: ADMISSION_KIND,
    response: {
      uid: '',
      allowed: true,
    },
  };

  const req = readRequest(body);
  if (typeof req === 'string') {
    logger.warn('Rejecting malformed AdmissionReview', { error: req });
    response.response.allowed = false;
    response.response.status = { code: 400, message: req };
    return response;
  }

  response.response.uid = req.uid;

  if (req.operation !== 'CREATE' && req.operation !== 'UPDATE') {
    return response;
  }
  if (req.resource && req.resource.resource !== 'pods') {
    logger.debug('Ignoring non-pod resource', { request: req.uid, resource: req.resource.resource });
    return response;
  }

  const outcome = mutatePod(req.object, { options: opts, logger, requestUid: req.uid });
  switch (outcome.kind) {
    case 'allowed':
      response.response.status = { code: 200, message: outcome.reason };
      break;
    case 'patched':
      if (outcome.patch.length > 0) {
        response.response.patchType = 'JSONPatch';
        response.response.patch = encodePatch(outcome.patch);
      }
      break;
    case 'denied':
      response.response.allowed = false;
      response.response.status = { code: 403, reason: 'Forbidden', message: outcome.reason };
      break;
    case 'errored':
      response.response.allowed = false;
      response.response.status = { code: outcome.code, message: outcome.message };
      break;
  }
  return response;
}
