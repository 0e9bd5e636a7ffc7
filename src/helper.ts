/**
 * "helper" mode: a spiffe-helper sidecar that keeps X.509 and JWT credentials
 * renewed on disk. Its config is rendered per pod and written by an init
 * container that runs before anything else in the pod.
 */

import path from 'node:path';
import {
  CERT_DIRECTORY,
  CERT_VOLUME,
  HELPER_CONFIG_ENV,
  HELPER_CONFIG_FILE,
  HELPER_CONFIG_MOUNT_PATH,
  HELPER_CONFIG_VOLUME,
  HELPER_HEALTH_PORT,
  HELPER_INIT_CONTAINER,
  HELPER_LIVENESS_PATH,
  HELPER_READINESS_PATH,
  HELPER_SIDECAR_CONTAINER,
  WORKLOAD_API_SOCKET_PATH,
} from './constants.js';
import { renderHelperConfig } from './helper-config.js';
import { emptyPlan, writeFileCommand } from './plan.js';
import type { Injector } from './plan.js';
import type { Container, InjectorOptions } from './types.js';
import { workloadApiEnvVar, workloadApiVolumeMount } from './workload.js';

export const HELPER_CONFIG_PATH = path.posix.join(HELPER_CONFIG_MOUNT_PATH, HELPER_CONFIG_FILE);

export function helperInitContainer(config: string, options: Readonly<InjectorOptions>): Container {
  return {
    name: HELPER_INIT_CONTAINER,
    image: options.initImage,
    imagePullPolicy: 'IfNotPresent',
    command: ['/bin/sh', '-c'],
    args: [writeFileCommand(HELPER_CONFIG_ENV, HELPER_CONFIG_PATH)],
    env: [{ name: HELPER_CONFIG_ENV, value: config }],
    volumeMounts: [
      { name: HELPER_CONFIG_VOLUME, mountPath: HELPER_CONFIG_MOUNT_PATH },
      { name: CERT_VOLUME, mountPath: CERT_DIRECTORY },
    ],
  };
}

export function helperSidecarContainer(options: Readonly<InjectorOptions>): Container {
  return {
    name: HELPER_SIDECAR_CONTAINER,
    image: options.helperImage,
    imagePullPolicy: 'IfNotPresent',
    args: ['-config', HELPER_CONFIG_PATH],
    env: [workloadApiEnvVar()],
    volumeMounts: [
      { name: HELPER_CONFIG_VOLUME, mountPath: HELPER_CONFIG_MOUNT_PATH, readOnly: true },
      { name: CERT_VOLUME, mountPath: CERT_DIRECTORY },
      workloadApiVolumeMount(),
    ],
    // 10 failures x 5s gives the agent ~50s to deliver the first SVID.
    startupProbe: {
      httpGet: { path: HELPER_READINESS_PATH, port: HELPER_HEALTH_PORT, scheme: 'HTTP' },
      initialDelaySeconds: 5,
      periodSeconds: 5,
      failureThreshold: 10,
      successThreshold: 1,
      timeoutSeconds: 2,
    },
    livenessProbe: {
      httpGet: { path: HELPER_LIVENESS_PATH, port: HELPER_HEALTH_PORT, scheme: 'HTTP' },
      initialDelaySeconds: 60,
      periodSeconds: 15,
      failureThreshold: 3,
      successThreshold: 1,
      timeoutSeconds: 5,
    },
    readinessProbe: {
      httpGet: { path: HELPER_READINESS_PATH, port: HELPER_HEALTH_PORT, scheme: 'HTTP' },
      initialDelaySeconds: 15,
      periodSeconds: 10,
      failureThreshold: 3,
      successThreshold: 1,
      timeoutSeconds: 5,
    },
  };
}

export const helperInjector: Injector = {
  name: 'helper',
  plan({ gate, options, logger }) {
    const config = renderHelperConfig({
      agentAddress: WORKLOAD_API_SOCKET_PATH,
      certDir: CERT_DIRECTORY,
      includeIntermediateBundle: gate.includeIntermediateBundle,
    });
    logger.debug('Rendered spiffe-helper config', { bytes: Buffer.byteLength(config) });

    return {
      ...emptyPlan(),
      volumes: [
        { name: HELPER_CONFIG_VOLUME, emptyDir: {} },
        { name: CERT_VOLUME, emptyDir: {} },
      ],
      initContainers: [{ container: helperInitContainer(config, options) }],
      containers: [helperSidecarContainer(options)],
    };
  },
};
