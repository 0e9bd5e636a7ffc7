/**
 * Injection plans: the resources an injector needs present after mutation,
 * and the one routine that makes them present.
 */

import path from 'node:path';
import type { Gate } from './annotations.js';
import type { Logger } from './logger.js';
import { ensureEnvVar, ensureNamed, ensureVolumeMount } from './presence.js';
import type { Container, EnvVar, InjectorOptions, Pod, Volume, VolumeMount } from './types.js';

export interface InitContainerEntry {
  container: Container;
  /** Names of init containers that may stay in front of this one. */
  after?: readonly string[];
}

export interface InjectionPlan {
  volumes: Volume[];
  initContainers: InitContainerEntry[];
  /** Appended to spec.containers. */
  containers: Container[];
  /** Added to every standard container present when the plan is applied. */
  containerMounts: VolumeMount[];
  containerEnv: EnvVar[];
}

export interface InjectionContext {
  gate: Gate;
  options: Readonly<InjectorOptions>;
  logger: Logger;
}

export interface Injector {
  readonly name: string;
  /** Builds the plan; throws RenderError when a config payload cannot be rendered. */
  plan(context: InjectionContext): InjectionPlan;
}

export function emptyPlan(): InjectionPlan {
  return { volumes: [], initContainers: [], containers: [], containerMounts: [], containerEnv: [] };
}

/** Applies a plan to the working copy. Returns the number of changes made. */
export function applyPlan(pod: Pod, plan: InjectionPlan, logger: Logger): number {
  let changes = 0;

  if (plan.volumes.length > 0) {
    const volumes = (pod.spec.volumes ??= []);
    for (const volume of plan.volumes) {
      if (ensureNamed(volumes, volume, { at: 'append' })) {
        logger.info('Adding volume', { volumeName: volume.name });
        changes++;
      }
    }
  }

  if (plan.initContainers.length > 0) {
    const initContainers = (pod.spec.initContainers ??= []);
    for (const { container, after } of plan.initContainers) {
      if (ensureNamed(initContainers, container, { at: 'prepend', after })) {
        logger.info('Adding init container', {
          initContainerName: container.name,
          index: initContainers.indexOf(container),
        });
        changes++;
      }
    }
  }

  for (const container of pod.spec.containers) {
    for (const mount of plan.containerMounts) {
      const change = ensureVolumeMount(container, mount);
      if (change === 'added') {
        logger.info('Adding volume mount to container', { containerName: container.name, volumeMountName: mount.name });
        changes++;
      } else if (change === 'updated') {
        logger.info('Updating readOnly on existing volume mount', {
          containerName: container.name,
          volumeMountName: mount.name,
          readOnly: mount.readOnly ?? false,
        });
        changes++;
      } else if (container.volumeMounts?.some((vm) => vm.name === mount.name && vm.mountPath !== mount.mountPath)) {
        logger.warn('Container mounts the volume at another path; leaving it', {
          containerName: container.name,
          volumeMountName: mount.name,
          expectedMountPath: mount.mountPath,
        });
      }
    }
    for (const envVar of plan.containerEnv) {
      if (ensureEnvVar(container, envVar)) {
        logger.info('Adding environment variable to container', { containerName: container.name, envVar: envVar.name });
        changes++;
      }
    }
  }

  for (const container of plan.containers) {
    if (ensureNamed(pod.spec.containers, container, { at: 'append' })) {
      logger.info('Adding sidecar container', { containerName: container.name });
      changes++;
    }
  }

  return changes;
}

/**
 * Shell command that copies the env var payload to the config file. The payload
 * is only ever referenced as "${VAR}", never spliced into the command text.
 */
export function writeFileCommand(envVar: string, filePath: string): string {
  return `mkdir -p ${path.posix.dirname(filePath)} && printf '%s' "\${${envVar}}" > ${filePath}`;
}
