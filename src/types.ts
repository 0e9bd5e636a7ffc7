/**
 * Kubernetes AdmissionReview and Pod types for the mutating webhook.
 * Only the fields the injector reads or writes are typed; everything else on the
 * incoming object is carried through untouched via the index signatures.
 */

export const ADMISSION_API_VERSION = 'admission.k8s.io/v1';
export const ADMISSION_KIND = 'AdmissionReview';

export type AdmissionOperation = 'CREATE' | 'UPDATE' | 'DELETE' | 'CONNECT';

/** AdmissionReview request as sent by the API server. */
export interface AdmissionRequest {
  uid: string;
  kind?: { group: string; version: string; kind: string };
  resource?: { group: string; version: string; resource: string };
  namespace?: string;
  name?: string;
  operation?: AdmissionOperation;
  object?: unknown;
  oldObject?: unknown;
  dryRun?: boolean;
}

/** AdmissionReview request body (what we receive). */
export interface AdmissionReviewRequest {
  apiVersion?: string;
  kind?: string;
  request?: AdmissionRequest | null;
}

export interface AdmissionStatus {
  code: number;
  message: string;
  reason?: string;
}

/** AdmissionReview response body (what we return). */
export interface AdmissionReviewResponse {
  apiVersion: string;
  kind: string;
  response: {
    uid: string;
    allowed: boolean;
    status?: AdmissionStatus;
    patchType?: 'JSONPatch';
    patch?: string;
    warnings?: string[];
  };
}

export interface PodMetadata {
  name?: string;
  namespace?: string;
  generateName?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  [key: string]: unknown;
}

export interface EnvVar {
  name: string;
  value?: string;
  valueFrom?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface VolumeMount {
  name: string;
  mountPath: string;
  readOnly?: boolean;
  subPath?: string;
  [key: string]: unknown;
}

export interface ContainerPort {
  containerPort: number;
  name?: string;
  protocol?: 'TCP' | 'UDP' | 'SCTP';
}

export interface SecurityContext {
  allowPrivilegeEscalation?: boolean;
  privileged?: boolean;
  runAsUser?: number;
  runAsGroup?: number;
  runAsNonRoot?: boolean;
  capabilities?: { add?: string[]; drop?: string[] };
  [key: string]: unknown;
}

export interface HttpGetProbe {
  httpGet: { path: string; port: number; scheme?: 'HTTP' | 'HTTPS' };
  initialDelaySeconds?: number;
  periodSeconds?: number;
  failureThreshold?: number;
  successThreshold?: number;
  timeoutSeconds?: number;
}

/** Pod spec.containers[] and spec.initContainers[]. */
export interface Container {
  name: string;
  image?: string;
  imagePullPolicy?: 'Always' | 'IfNotPresent' | 'Never';
  command?: string[];
  args?: string[];
  env?: EnvVar[];
  volumeMounts?: VolumeMount[];
  securityContext?: SecurityContext;
  ports?: ContainerPort[];
  startupProbe?: HttpGetProbe;
  livenessProbe?: HttpGetProbe;
  readinessProbe?: HttpGetProbe;
  [key: string]: unknown;
}

export interface Volume {
  name: string;
  emptyDir?: { medium?: string; sizeLimit?: string };
  csi?: { driver: string; readOnly?: boolean; volumeAttributes?: Record<string, string> };
  [key: string]: unknown;
}

export interface PodSpec {
  containers: Container[];
  initContainers?: Container[];
  volumes?: Volume[];
  [key: string]: unknown;
}

/** The pod object from request.object after structural validation. */
export interface Pod {
  apiVersion?: string;
  kind?: string;
  metadata: PodMetadata;
  spec: PodSpec;
  [key: string]: unknown;
}

/** Images and agent endpoint used by the injectors. Read-only once loaded. */
export interface InjectorOptions {
  /** Renewal agent (spiffe-helper) sidecar image. */
  helperImage: string;
  /** Image for the init containers that write rendered config to disk. Needs sh and nft. */
  initImage: string;
  /** Proxy sidecar image; must provide the envoy binary. */
  proxyImage: string;
  /** Debug UI sidecar image. */
  debugUiImage: string;
  /** In-cluster service name of the agent's aggregated discovery endpoint. */
  agentXdsService: string;
  agentXdsPort: number;
}

export const DEFAULT_INJECTOR_OPTIONS: Readonly<InjectorOptions> = Object.freeze({
  helperImage: 'ghcr.io/spiffe/spiffe-helper:0.10.0',
  initImage: 'cgr.dev/chainguard/busybox:latest',
  proxyImage: 'docker.io/istio/proxyv2:1.26.4',
  debugUiImage: 'workload-identity-debug-ui:latest',
  agentXdsService: 'identity-agent.identity-system.svc.cluster.local',
  agentXdsPort: 18001,
});
