import {
  ImageManifest,
  RetentionPolicy,
  DeletionPlan,
  DeletionReason,
  PlanItem,
  PolicyResolutionWarning,
} from '../types';
import { ImageReference, matchesPattern, parseImageReference } from '../utils/validation';
import { errorMessage } from '../utils/errors';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface Evaluation {
  plan: DeletionPlan;
  /**
   * Manifests that match a deletion reason but are pinned by an exclusion
   */
  retained: ImageManifest[];
  warnings: PolicyResolutionWarning[];
}

interface ExclusionSet {
  anyRepository: Set<string>;
  byRepository: Set<string>;
}

export function createRetentionPolicy(
  maxAgeDays: number,
  exclusions: readonly string[] = [],
  excludedRepositories: readonly string[] = []
): RetentionPolicy {
  return Object.freeze({
    maxAgeDays,
    exclusions: Object.freeze([...exclusions]),
    excludedRepositories: Object.freeze([...excludedRepositories]),
  });
}

function digestKey(repository: string, digest: string): string {
  return `${repository}@${digest}`;
}

/**
 * Resolve every exclusion reference to a pinned digest.
 * References that cannot be parsed or resolved are dropped with a warning.
 */
export function resolveExclusions(
  inventory: readonly ImageManifest[],
  exclusions: readonly string[]
): { exclusions: ExclusionSet; warnings: PolicyResolutionWarning[] } {
  const tagIndex = new Map<string, string>();
  const knownDigests = new Set<string>();
  const knownKeys = new Set<string>();
  for (const manifest of inventory) {
    knownDigests.add(manifest.digest);
    knownKeys.add(digestKey(manifest.repository, manifest.digest));
    for (const tag of manifest.tags) {
      tagIndex.set(`${manifest.repository}:${tag}`, manifest.digest);
    }
  }

  const resolved: ExclusionSet = { anyRepository: new Set(), byRepository: new Set() };
  const warnings: PolicyResolutionWarning[] = [];

  for (const reference of exclusions) {
    let parsed: ImageReference;
    try {
      parsed = parseImageReference(reference);
    } catch (error) {
      warnings.push({ reference, message: errorMessage(error) });
      continue;
    }

    if (parsed.kind === 'tag') {
      const digest = tagIndex.get(`${parsed.repository}:${parsed.tag}`);
      if (digest === undefined) {
        warnings.push({ reference, message: `Tag ${parsed.repository}:${parsed.tag} not found in registry` });
        continue;
      }
      resolved.byRepository.add(digestKey(parsed.repository, digest));
    } else if (parsed.repository === undefined) {
      if (!knownDigests.has(parsed.digest)) {
        warnings.push({ reference, message: `Digest ${parsed.digest} not found in registry` });
        continue;
      }
      resolved.anyRepository.add(parsed.digest);
    } else {
      const key = digestKey(parsed.repository, parsed.digest);
      if (!knownKeys.has(key)) {
        warnings.push({ reference, message: `Image ${key} not found in registry` });
        continue;
      }
      resolved.byRepository.add(key);
    }
  }

  return { exclusions: resolved, warnings };
}

/**
 * Untagged manifests are dangling regardless of age; tagged manifests
 * expire once strictly older than maxAgeDays.
 */
export function classifyManifest(
  manifest: ImageManifest,
  maxAgeDays: number,
  now: Date
): DeletionReason | undefined {
  if (manifest.tags.length === 0) {
    return 'dangling';
  }
  if (now.getTime() - manifest.lastUpdatedOn.getTime() > maxAgeDays * DAY_MS) {
    return 'expired';
  }
  return undefined;
}

function comparePlanItems(a: PlanItem, b: PlanItem): number {
  if (a.digest !== b.digest) {
    return a.digest < b.digest ? -1 : 1;
  }
  if (a.repository !== b.repository) {
    return a.repository < b.repository ? -1 : 1;
  }
  return 0;
}

/**
 * Build the deletion plan. Pure: same inventory, policy and now always give the same plan.
 */
export function evaluate(
  inventory: readonly ImageManifest[],
  policy: RetentionPolicy,
  now: Date
): Evaluation {
  const { exclusions, warnings } = resolveExclusions(inventory, policy.exclusions);
  const plan: PlanItem[] = [];
  const retained: ImageManifest[] = [];

  for (const manifest of inventory) {
    if (matchesPattern(manifest.repository, policy.excludedRepositories)) {
      continue;
    }

    const reason = classifyManifest(manifest, policy.maxAgeDays, now);
    if (reason === undefined) {
      continue;
    }

    if (
      exclusions.anyRepository.has(manifest.digest) ||
      exclusions.byRepository.has(digestKey(manifest.repository, manifest.digest))
    ) {
      retained.push(manifest);
      continue;
    }

    plan.push({
      repository: manifest.repository,
      digest: manifest.digest,
      tags: [...manifest.tags],
      reason,
      ageDays: Math.floor((now.getTime() - manifest.lastUpdatedOn.getTime()) / DAY_MS),
      sizeInBytes: manifest.sizeInBytes,
    });
  }

  plan.sort(comparePlanItems);
  return { plan, retained, warnings };
}
