/**
 * Presence queries and name-keyed upserts over the pod's ordered lists.
 * Injectors never push onto a list directly; going through ensureNamed and
 * friends is what keeps a second admission of a mutated pod a no-op.
 */

import type { Container, EnvVar, Pod, VolumeMount } from './types.js';

export interface Named {
  name: string;
}

export type Placement =
  | { at: 'append' }
  /** Insert at the front, but behind any leading entries whose names are listed in `after`. */
  | { at: 'prepend'; after?: readonly string[] };

export interface MountPresence {
  /** An entry with the same name and mount path exists. */
  exists: boolean;
  readOnlyMatches: boolean;
  index?: number;
}

export type MountChange = 'added' | 'updated' | 'unchanged';

export function indexOfName(items: readonly Named[] | undefined, name: string): number {
  return items?.findIndex((item) => item.name === name) ?? -1;
}

export function hasVolume(pod: Pod, name: string): boolean {
  return indexOfName(pod.spec.volumes, name) !== -1;
}

export function hasContainer(containers: readonly Container[] | undefined, name: string): boolean {
  return indexOfName(containers, name) !== -1;
}

export function hasEnvVar(container: Container, name: string): boolean {
  return indexOfName(container.env, name) !== -1;
}

export function hasVolumeMount(container: Container, mount: VolumeMount): MountPresence {
  const index =
    container.volumeMounts?.findIndex((vm) => vm.name === mount.name && vm.mountPath === mount.mountPath) ?? -1;
  if (index === -1 || !container.volumeMounts) {
    return { exists: false, readOnlyMatches: false };
  }
  const current = container.volumeMounts[index].readOnly ?? false;
  return { exists: true, readOnlyMatches: current === (mount.readOnly ?? false), index };
}

/**
 * Inserts `item` unless an entry with the same name is already present.
 * Returns true when the list changed.
 */
export function ensureNamed<T extends Named>(items: T[], item: T, placement: Placement): boolean {
  if (indexOfName(items, item.name) !== -1) return false;
  if (placement.at === 'append') {
    items.push(item);
    return true;
  }
  const after = new Set(placement.after ?? []);
  let position = 0;
  while (position < items.length && after.has(items[position].name)) {
    position++;
  }
  items.splice(position, 0, item);
  return true;
}

/**
 * Ensures the container mounts `mount`. A mount with the same name and path but a
 * different read-only flag is corrected in place. A mount of the same volume at a
 * different path is left alone so the container never carries two mounts of one name.
 */
export function ensureVolumeMount(container: Container, mount: VolumeMount): MountChange {
  const presence = hasVolumeMount(container, mount);
  const mounts = (container.volumeMounts ??= []);
  if (presence.exists && presence.index !== undefined) {
    if (presence.readOnlyMatches) return 'unchanged';
    mounts[presence.index].readOnly = mount.readOnly ?? false;
    return 'updated';
  }
  return ensureNamed(mounts, { ...mount }, { at: 'append' }) ? 'added' : 'unchanged';
}

/** Appends `envVar` when the container has no variable of that name; existing values win. */
export function ensureEnvVar(container: Container, envVar: EnvVar): boolean {
  return ensureNamed((container.env ??= []), { ...envVar }, { at: 'append' });
}
