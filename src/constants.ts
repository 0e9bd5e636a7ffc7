/** Exit code: configuration error (invalid PORT, half-configured TLS, etc.). */
export const EXIT_CONFIG = 1;
/** Exit code: runtime fatal error (listen failed, or error during shutdown). */
export const EXIT_RUNTIME = 2;

// Pod annotations read by the gate.
export const ANNOTATION_PREFIX = 'workload-identity.io';
export const ENABLED_ANNOTATION = `${ANNOTATION_PREFIX}/enabled`;
export const MODE_ANNOTATION = `${ANNOTATION_PREFIX}/mode`;
export const DEBUG_ANNOTATION = `${ANNOTATION_PREFIX}/debug`;
export const INCLUDE_INTERMEDIATE_ANNOTATION = `${ANNOTATION_PREFIX}/helper-include-intermediate-bundle`;

// SPIFFE Workload API socket, delivered by the CSI driver.
export const WORKLOAD_API_VOLUME = 'spiffe-workload-api';
export const WORKLOAD_API_CSI_DRIVER = 'csi.spiffe.io';
export const WORKLOAD_API_MOUNT_PATH = '/spiffe-workload-api';
export const WORKLOAD_API_SOCKET_ENV = 'SPIFFE_ENDPOINT_SOCKET';
export const WORKLOAD_API_SOCKET_PATH = `${WORKLOAD_API_MOUNT_PATH}/spire-agent.sock`;
export const WORKLOAD_API_SOCKET = `unix://${WORKLOAD_API_SOCKET_PATH}`;

// Credentials written by the renewal agent.
export const CERT_VOLUME = 'workload-identity-certs';
export const CERT_DIRECTORY = '/workload-identity';

// Renewal agent (spiffe-helper).
export const HELPER_CONFIG_VOLUME = 'spiffe-helper-config';
export const HELPER_CONFIG_MOUNT_PATH = '/etc/spiffe-helper';
export const HELPER_CONFIG_FILE = 'config.conf';
export const HELPER_CONFIG_ENV = 'SPIFFE_HELPER_CONFIG';
export const HELPER_INIT_CONTAINER = 'inject-spiffe-helper-config';
export const HELPER_SIDECAR_CONTAINER = 'spiffe-helper';
export const HELPER_HEALTH_PORT = 8081;
export const HELPER_READINESS_PATH = '/ready';
export const HELPER_LIVENESS_PATH = '/live';

// Proxy (Envoy).
export const PROXY_CONFIG_VOLUME = 'envoy-config';
export const PROXY_CONFIG_MOUNT_PATH = '/etc/envoy';
export const PROXY_CONFIG_FILE = 'envoy.json';
export const PROXY_CONFIG_ENV = 'ENVOY_CONFIG_CONTENT';
export const PROXY_INIT_CONTAINER = 'inject-envoy-config';
export const PROXY_SIDECAR_CONTAINER = 'envoy-sidecar';
export const PROXY_PORT = 10000;
export const PROXY_ADMIN_PORT = 9901;
export const PROXY_UID = 1337;
export const DNS_PROXY_PORT = 15053;

// Debug UI sidecar.
export const DEBUG_UI_CONTAINER = 'workload-identity-debug-ui';
export const DEBUG_UI_PORT = 8000;

export const MIN_PORT = 1;
export const MAX_PORT = 65_535;
