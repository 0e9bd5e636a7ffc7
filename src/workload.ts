/**
 * SPIFFE Workload API access for every container in the pod, plus the optional
 * debug UI sidecar that displays the pod's credentials.
 */

import {
  DEBUG_UI_CONTAINER,
  DEBUG_UI_PORT,
  WORKLOAD_API_CSI_DRIVER,
  WORKLOAD_API_MOUNT_PATH,
  WORKLOAD_API_SOCKET,
  WORKLOAD_API_SOCKET_ENV,
  WORKLOAD_API_VOLUME,
} from './constants.js';
import { emptyPlan } from './plan.js';
import type { Injector } from './plan.js';
import type { EnvVar, Volume, VolumeMount } from './types.js';

export function workloadApiVolume(): Volume {
  return {
    name: WORKLOAD_API_VOLUME,
    csi: { driver: WORKLOAD_API_CSI_DRIVER, readOnly: true },
  };
}

export function workloadApiVolumeMount(): VolumeMount {
  return { name: WORKLOAD_API_VOLUME, mountPath: WORKLOAD_API_MOUNT_PATH, readOnly: true };
}

export function workloadApiEnvVar(): EnvVar {
  return { name: WORKLOAD_API_SOCKET_ENV, value: WORKLOAD_API_SOCKET };
}

export const identitySocketInjector: Injector = {
  name: 'identity-socket',
  plan() {
    return {
      ...emptyPlan(),
      volumes: [workloadApiVolume()],
      containerMounts: [workloadApiVolumeMount()],
      containerEnv: [workloadApiEnvVar()],
    };
  },
};

export const debugUiInjector: Injector = {
  name: 'debug-ui',
  plan({ options }) {
    return {
      ...emptyPlan(),
      containers: [
        {
          name: DEBUG_UI_CONTAINER,
          image: options.debugUiImage,
          imagePullPolicy: 'Always',
          ports: [{ containerPort: DEBUG_UI_PORT }],
          env: [workloadApiEnvVar()],
          volumeMounts: [workloadApiVolumeMount()],
        },
      ],
    };
  },
};
