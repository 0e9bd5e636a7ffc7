/**
 * "proxy" mode: an Envoy sidecar bootstrapped against the agent's ADS endpoint,
 * with an init container that writes the bootstrap and installs the nftables
 * redirection rules.
 */

import path from 'node:path';
import {
  HELPER_INIT_CONTAINER,
  PROXY_ADMIN_PORT,
  PROXY_CONFIG_ENV,
  PROXY_CONFIG_FILE,
  PROXY_CONFIG_MOUNT_PATH,
  PROXY_CONFIG_VOLUME,
  PROXY_INIT_CONTAINER,
  PROXY_PORT,
  PROXY_SIDECAR_CONTAINER,
  PROXY_UID,
} from './constants.js';
import { emptyPlan, writeFileCommand } from './plan.js';
import type { Injector } from './plan.js';
import { renderProxyBootstrap, renderRedirectScript } from './proxy-config.js';
import type { Container, InjectorOptions } from './types.js';
import { workloadApiEnvVar, workloadApiVolumeMount } from './workload.js';

export const PROXY_CONFIG_PATH = path.posix.join(PROXY_CONFIG_MOUNT_PATH, PROXY_CONFIG_FILE);

export function proxyInitContainer(bootstrap: string, script: string, options: Readonly<InjectorOptions>): Container {
  const command = ['set -e', writeFileCommand(PROXY_CONFIG_ENV, PROXY_CONFIG_PATH), script].join('\n');
  return {
    name: PROXY_INIT_CONTAINER,
    image: options.initImage,
    imagePullPolicy: 'IfNotPresent',
    command: ['/bin/sh', '-c'],
    args: [command],
    env: [{ name: PROXY_CONFIG_ENV, value: bootstrap }],
    volumeMounts: [{ name: PROXY_CONFIG_VOLUME, mountPath: PROXY_CONFIG_MOUNT_PATH }],
    // root with NET_ADMIN/NET_RAW is what nft needs to install the rules
    securityContext: {
      capabilities: { add: ['NET_ADMIN', 'NET_RAW'] },
      runAsUser: 0,
      runAsNonRoot: false,
    },
  };
}

export function proxySidecarContainer(options: Readonly<InjectorOptions>): Container {
  return {
    name: PROXY_SIDECAR_CONTAINER,
    image: options.proxyImage,
    imagePullPolicy: 'IfNotPresent',
    command: ['envoy'],
    args: ['-c', PROXY_CONFIG_PATH],
    env: [workloadApiEnvVar()],
    volumeMounts: [
      { name: PROXY_CONFIG_VOLUME, mountPath: PROXY_CONFIG_MOUNT_PATH, readOnly: true },
      workloadApiVolumeMount(),
    ],
    securityContext: {
      allowPrivilegeEscalation: false,
      runAsUser: PROXY_UID,
      runAsGroup: PROXY_UID,
      runAsNonRoot: true,
      privileged: false,
      capabilities: { drop: ['ALL'] },
    },
    ports: [{ containerPort: PROXY_PORT }],
  };
}

export const proxyInjector: Injector = {
  name: 'proxy',
  plan({ options, logger }) {
    const bootstrap = renderProxyBootstrap({
      adminPort: PROXY_ADMIN_PORT,
      xdsService: options.agentXdsService,
      xdsPort: options.agentXdsPort,
    });
    const script = renderRedirectScript();
    logger.debug('Rendered proxy bootstrap', { bytes: Buffer.byteLength(bootstrap) });

    return {
      ...emptyPlan(),
      volumes: [{ name: PROXY_CONFIG_VOLUME, emptyDir: {} }],
      // The helper's config writer keeps index 0 when both modes are on.
      initContainers: [{ container: proxyInitContainer(bootstrap, script, options), after: [HELPER_INIT_CONTAINER] }],
      containers: [proxySidecarContainer(options)],
    };
  },
};
