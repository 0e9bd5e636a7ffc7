/**
 * Workload identity injector: mutating admission webhook that gives pods access to
 * the SPIFFE Workload API and, on request, credential-renewal and proxy sidecars.
 * Run src/entrypoint.ts to serve; import from here for programmatic use.
 */

export { handleAdmissionReview } from './handler.js';
export { mutatePod } from './mutate.js';
export type { MutateOptions, MutationOutcome } from './mutate.js';
export { parseModeTokens, readGate } from './annotations.js';
export type { Gate } from './annotations.js';
export { CAPABILITIES, CAPABILITY_NAMES, isCapabilityName, resolveCapabilities } from './capabilities.js';
export type { CapabilityName } from './capabilities.js';
export {
  ensureEnvVar,
  ensureNamed,
  ensureVolumeMount,
  hasContainer,
  hasEnvVar,
  hasVolume,
  hasVolumeMount,
} from './presence.js';
export type { MountChange, MountPresence, Placement } from './presence.js';
export { applyPlan } from './plan.js';
export type { InjectionContext, InjectionPlan, Injector } from './plan.js';
export { renderHelperConfig } from './helper-config.js';
export type { HelperConfigParams } from './helper-config.js';
export { canonicalJson, renderProxyBootstrap, renderRedirectScript } from './proxy-config.js';
export type { ProxyBootstrapParams, RedirectScriptParams } from './proxy-config.js';
export { applyPatch, createPatch, encodePatch } from './patch.js';
export type { JsonPatchOp } from './patch.js';
export { decodePod } from './validation.js';
export { AdmissionError, DecodeError, MarshalError, RenderError, ValidationError } from './errors.js';
export { ConfigError, loadConfig } from './config.js';
export type { WebhookConfig } from './config.js';
export { createWebhookServer, startServer } from './server.js';
export type { ServerOptions } from './server.js';
export { createLogger } from './logger.js';
export type { LogLevel, LogRecord, Logger } from './logger.js';
export type {
  AdmissionRequest,
  AdmissionReviewRequest,
  AdmissionReviewResponse,
  Container,
  InjectorOptions,
  Pod,
} from './types.js';
export { DEFAULT_INJECTOR_OPTIONS } from './types.js';
