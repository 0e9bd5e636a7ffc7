/**
 * Proxy (Envoy) bootstrap and the nftables script that steers the pod's DNS and
 * loopback traffic through it. The bootstrap is emitted as canonical JSON so that
 * identical parameters always give byte-identical env var values.
 */

import { DNS_PROXY_PORT, MAX_PORT, MIN_PORT, PROXY_ADMIN_PORT, PROXY_PORT, PROXY_UID } from './constants.js';
import { RenderError } from './errors.js';

export const XDS_CLUSTER_NAME = 'xds_cluster';

export interface ProxyBootstrapParams {
  nodeId?: string;
  clusterName?: string;
  adminAddress?: string;
  adminPort?: number;
  /** Agent service serving aggregated discovery (ADS). */
  xdsService: string;
  xdsPort: number;
}

export interface RedirectScriptParams {
  proxyUid?: number;
  proxyPort?: number;
  dnsProxyPort?: number;
  adminPort?: number;
}

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

function requirePort(renderer: string, field: string, value: number): number {
  if (!Number.isInteger(value) || value < MIN_PORT || value > MAX_PORT) {
    throw new RenderError(`${field} must be an integer between ${MIN_PORT} and ${MAX_PORT}, got ${value}`, renderer);
  }
  return value;
}

function requireNonEmpty(renderer: string, field: string, value: string): string {
  if (value.trim() === '') {
    throw new RenderError(`${field} must be a non-empty string`, renderer);
  }
  return value;
}

/** Returns a deep copy of `value` with every object's keys in sorted order. */
export function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}

export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(sortKeys(value), null, 2);
}

function socketAddress(address: string, port: number): JsonValue {
  return { socket_address: { address, port_value: port } };
}

export function buildProxyBootstrap(params: ProxyBootstrapParams): JsonObject {
  const renderer = 'proxy-bootstrap';
  const nodeId = params.nodeId || 'node';
  const clusterName = params.clusterName || 'cluster';
  const adminAddress = params.adminAddress || '127.0.0.1';
  const adminPort = requirePort(renderer, 'adminPort', params.adminPort ?? PROXY_ADMIN_PORT);
  const xdsService = requireNonEmpty(renderer, 'xdsService', params.xdsService);
  const xdsPort = requirePort(renderer, 'xdsPort', params.xdsPort);

  return {
    node: { id: nodeId, cluster: clusterName },
    admin: { address: socketAddress(adminAddress, adminPort) },
    dynamic_resources: {
      ads_config: {
        api_type: 'GRPC',
        transport_api_version: 'V3',
        grpc_services: [{ envoy_grpc: { cluster_name: XDS_CLUSTER_NAME } }],
        set_node_on_first_message_only: true,
      },
      cds_config: { resource_api_version: 'V3', ads: {} },
      lds_config: { resource_api_version: 'V3', ads: {} },
    },
    static_resources: {
      clusters: [
        {
          name: XDS_CLUSTER_NAME,
          type: 'LOGICAL_DNS',
          connect_timeout: '5s',
          typed_extension_protocol_options: {
            'envoy.extensions.upstreams.http.v3.HttpProtocolOptions': {
              '@type': 'type.googleapis.com/envoy.extensions.upstreams.http.v3.HttpProtocolOptions',
              explicit_http_config: { http2_protocol_options: {} },
            },
          },
          load_assignment: {
            cluster_name: XDS_CLUSTER_NAME,
            endpoints: [{ lb_endpoints: [{ endpoint: { address: socketAddress(xdsService, xdsPort) } }] }],
          },
        },
      ],
    },
  };
}

export function renderProxyBootstrap(params: ProxyBootstrapParams): string {
  return canonicalJson(buildProxyBootstrap(params));
}

/**
 * Shell script for the privileged init container. The proxy's own traffic (by uid)
 * and traffic already addressed to its ports are returned before any redirect,
 * otherwise the proxy would loop into itself.
 */
export function renderRedirectScript(params: RedirectScriptParams = {}): string {
  const renderer = 'redirect-script';
  const proxyUid = params.proxyUid ?? PROXY_UID;
  if (!Number.isInteger(proxyUid) || proxyUid < 0) {
    throw new RenderError(`proxyUid must be a non-negative integer, got ${proxyUid}`, renderer);
  }
  const proxyPort = requirePort(renderer, 'proxyPort', params.proxyPort ?? PROXY_PORT);
  const dnsProxyPort = requirePort(renderer, 'dnsProxyPort', params.dnsProxyPort ?? DNS_PROXY_PORT);
  const adminPort = requirePort(renderer, 'adminPort', params.adminPort ?? PROXY_ADMIN_PORT);

  return [
    'if ! command -v nft >/dev/null 2>&1; then',
    '  echo "nftables (nft) is not installed"',
    '  exit 1',
    'fi',
    '',
    "cat <<'EOF' > /tmp/proxy_redirect.nft",
    'table inet proxy_redirect {',
    '  chain output {',
    '    type nat hook output priority dstnat; policy accept;',
    '',
    `    meta skuid ${proxyUid} return`,
    '',
    `    udp dport 53 counter redirect to :${dnsProxyPort} comment "DNS UDP to proxy"`,
    `    tcp dport 53 counter redirect to :${dnsProxyPort} comment "DNS TCP to proxy"`,
    '',
    `    tcp dport ${proxyPort} return`,
    `    tcp dport ${adminPort} return`,
    '',
    `    ip daddr 127.0.0.0/8 tcp dport 1-65535 counter redirect to :${proxyPort} comment "Loopback IPv4 to proxy"`,
    `    ip6 daddr ::1/128 tcp dport 1-65535 counter redirect to :${proxyPort} comment "Loopback IPv6 to proxy"`,
    '  }',
    '}',
    'EOF',
    '',
    'nft -f /tmp/proxy_redirect.nft',
    'echo "nftables redirection rules applied:"',
    'nft list table inet proxy_redirect',
    '',
  ].join('\n');
}
