/**
 * Helpers for working with resource kinds.
 */

import type { CanonicalResource, ResourceKind } from '@shared/types';

/**
 * Service aliases accepted on the command line and in configuration.
 */
const KIND_ALIASES: Readonly<Record<string, ResourceKind>> = {
  compute: 'compute',
  ec2: 'compute',
  'block-volume': 'block-volume',
  ebs: 'block-volume',
  'object-store': 'object-store',
  s3: 'object-store',
  'floating-ip': 'floating-ip',
  eip: 'floating-ip',
  snapshot: 'snapshot',
  snapshots: 'snapshot',
};

/**
 * Build a record with one entry per kind.
 */
export function mapKinds<T>(fn: (kind: ResourceKind) => T): Record<ResourceKind, T> {
  return {
    compute: fn('compute'),
    'block-volume': fn('block-volume'),
    'object-store': fn('object-store'),
    'floating-ip': fn('floating-ip'),
    snapshot: fn('snapshot'),
  };
}

/**
 * Resolve a kind name or alias (case-insensitive), e.g. "EBS" -> "block-volume".
 */
export function parseKind(value: string): ResourceKind | undefined {
  const key = value.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(KIND_ALIASES, key) ? KIND_ALIASES[key] : undefined;
}

/**
 * Names accepted by parseKind, for error messages.
 */
export function knownKindNames(): string[] {
  return Object.keys(KIND_ALIASES);
}

/**
 * Resources of one kind, in their original order.
 */
export function ofKind<K extends ResourceKind>(
  resources: readonly CanonicalResource[],
  kind: K
): Extract<CanonicalResource, { kind: K }>[] {
  return resources.filter((resource): resource is Extract<CanonicalResource, { kind: K }> => {
    return resource.kind === kind;
  });
}
