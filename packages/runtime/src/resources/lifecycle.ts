import { type RuntimeResource } from '@worksheetbot/core';

/** Drops absent and repeated resources, keeping first-seen order. */
export function collectLifecycleResources(candidates: Array<RuntimeResource | undefined>): RuntimeResource[] {
  const unique = new Set<RuntimeResource>();
  for (const candidate of candidates) {
    if (candidate) {
      unique.add(candidate);
    }
  }

  return [...unique];
}

export async function startResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of resources) {
    await resource.start?.();
  }
}

export async function closeResources(resources: RuntimeResource[]): Promise<void> {
  for (const resource of [...resources].reverse()) {
    await resource.close?.();
  }
}
