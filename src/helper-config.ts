/**
 * Renewal agent (spiffe-helper) configuration, rendered from a typed parameter
 * struct into a fixed HCL layout. Values are escaped by the encoder here, so
 * nothing from the parameters can break out of its string literal.
 */

import {
  CERT_DIRECTORY,
  HELPER_HEALTH_PORT,
  HELPER_LIVENESS_PATH,
  HELPER_READINESS_PATH,
  WORKLOAD_API_SOCKET_PATH,
} from './constants.js';
import { RenderError } from './errors.js';

export const HELPER_CONFIG_FORMAT_VERSION = 1;

const RENDERER = 'helper-config';

export interface HelperConfigParams {
  /** Path of the agent socket. Default: the Workload API socket mounted into the pod. */
  agentAddress?: string;
  /** Directory the helper writes certificates, keys and bundles to. */
  certDir?: string;
  /** Adds intermediate CAs to the written trust bundle. */
  includeIntermediateBundle?: boolean;
}

type HclScalar = string | number | boolean;
type HclValue = HclScalar | HclValue[] | { [key: string]: HclValue };
type HclEntry = { key: string; value: HclValue } | { block: string; entries: HclEntry[] };

function encodeString(value: string): string {
  // HCL treats ${ and %{ as template sequences even inside quotes.
  return JSON.stringify(value)
    .replace(/\$\{/g, () => '$${')
    .replace(/%\{/g, () => '%%{');
}

function encodeValue(value: HclValue): string {
  if (typeof value === 'string') return encodeString(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') {
    if (!Number.isInteger(value)) {
      throw new RenderError(`cannot encode non-integer number ${value}`, RENDERER);
    }
    return String(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(encodeValue).join(', ')}]`;
  }
  const fields = Object.entries(value).map(([k, v]) => `${k} = ${encodeValue(v)}`);
  return `{${fields.join(', ')}}`;
}

function encodeEntries(entries: HclEntry[], indent: string): string[] {
  const lines: string[] = [];
  for (const entry of entries) {
    if ('block' in entry) {
      lines.push(`${indent}${entry.block} {`);
      lines.push(...encodeEntries(entry.entries, indent + '  '));
      lines.push(`${indent}}`);
    } else {
      lines.push(`${indent}${entry.key} = ${encodeValue(entry.value)}`);
    }
  }
  return lines;
}

function requireAbsolutePath(value: string, field: string): string {
  if (!value.startsWith('/')) {
    throw new RenderError(`${field} must be an absolute path, got ${JSON.stringify(value)}`, RENDERER);
  }
  if (/[\u0000-\u001f]/.test(value)) {
    throw new RenderError(`${field} must not contain control characters`, RENDERER);
  }
  return value;
}

export function renderHelperConfig(params: HelperConfigParams = {}): string {
  const agentAddress = requireAbsolutePath(params.agentAddress ?? WORKLOAD_API_SOCKET_PATH, 'agentAddress');
  const certDir = requireAbsolutePath(params.certDir ?? CERT_DIRECTORY, 'certDir');

  const entries: HclEntry[] = [
    { key: 'agent_address', value: agentAddress },
    { key: 'include_federated_domains', value: true },
  ];
  if (params.includeIntermediateBundle === true) {
    entries.push({ key: 'add_intermediates_to_bundle', value: true });
  }
  entries.push(
    { key: 'cmd', value: '' },
    { key: 'cmd_args', value: '' },
    { key: 'cert_dir', value: certDir },
    { key: 'renew_signal', value: '' },
    { key: 'svid_file_name', value: 'tls.crt' },
    { key: 'svid_key_file_name', value: 'tls.key' },
    { key: 'svid_bundle_file_name', value: 'ca.pem' },
    { key: 'jwt_bundle_file_name', value: 'cert.jwt' },
    { key: 'jwt_svids', value: [{ jwt_audience: 'aud', jwt_svid_file_name: 'jwt_svid.token' }] },
    { key: 'daemon_mode', value: true },
    {
      block: 'health_checks',
      entries: [
        { key: 'listener_enabled', value: true },
        { key: 'bind_port', value: HELPER_HEALTH_PORT },
        { key: 'liveness_path', value: HELPER_LIVENESS_PATH },
        { key: 'readiness_path', value: HELPER_READINESS_PATH },
      ],
    }
  );

  const lines = [`# helper-config v${HELPER_CONFIG_FORMAT_VERSION}`, ...encodeEntries(entries, '')];
  return lines.join('\n') + '\n';
}
