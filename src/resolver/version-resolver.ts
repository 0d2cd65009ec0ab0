/**
 * Product & Version Resolver
 *
 * A detail document lists every submission of a product type in no
 * particular order. The resolver rebuilds a per-source version history and
 * answers source × version selections over it:
 *
 * 1. Drop submissions whose status is DELETE (case-insensitive)
 * 2. Group by source, groups ordered by first appearance
 * 3. Within a group, stable-sort by updateTime and number 1..N
 * 4. Source selector: 'preferred' keeps the group holding the global maximum
 *    preferredWeight (ties: earliest in input order), 'all' keeps every
 *    group, anything else names one source
 * 5. Version selector per group: first, last, all, or preferred (max weight,
 *    then latest updateTime, then latest input position)
 * 6. Output by group order, then ordinal ascending
 *
 * Pure: nothing is cached, so repeated calls assign identical ordinals.
 *
 * @module version-resolver
 */

import { ProductNotFoundError, UndefinedVersionError } from '../core/errors.js';
import { ResolvedProduct } from '../models/product.js';
import type { RawProduct } from '../models/schemas.js';

// ============================================================================
// Types
// ============================================================================

export const VERSION_SELECTORS = ['preferred', 'first', 'last', 'all'] as const;

export type VersionSelector = (typeof VERSION_SELECTORS)[number];

/**
 * 'preferred', 'all', or an explicit source code such as "us"
 */
export type SourceSelector = 'preferred' | 'all' | (string & {});

/**
 * Anything that can hand the resolver its raw submissions
 */
export interface ProductSubmissions {
  readonly id: string;
  getRawProducts(productType: string): readonly RawProduct[];
}

/**
 * A submission with its ordinal and original position
 */
export interface VersionedSubmission {
  readonly raw: RawProduct;
  readonly version: number;
  readonly inputIndex: number;
}

/**
 * Submissions of one source, ordinal ascending
 */
export interface SourceGroup {
  readonly source: string;
  readonly versions: readonly VersionedSubmission[];
}

export function isVersionSelector(value: string): value is VersionSelector {
  return (VERSION_SELECTORS as readonly string[]).includes(value);
}

export function isDeleted(product: RawProduct): boolean {
  return product.status.toUpperCase() === 'DELETE';
}

// ============================================================================
// Version Assignment
// ============================================================================

/**
 * Group live submissions by source and assign ordinal versions
 */
export function assignVersions(submissions: readonly RawProduct[]): SourceGroup[] {
  const groups = new Map<string, { raw: RawProduct; inputIndex: number }[]>();

  submissions.forEach((raw, inputIndex) => {
    if (isDeleted(raw)) return;
    const group = groups.get(raw.source);
    if (group) {
      group.push({ raw, inputIndex });
    } else {
      groups.set(raw.source, [{ raw, inputIndex }]);
    }
  });

  const result: SourceGroup[] = [];
  for (const [source, members] of groups) {
    // Array.prototype.sort is stable; equal times keep input order
    const ordered = [...members].sort((a, b) => a.raw.updateTime - b.raw.updateTime);
    result.push({
      source,
      versions: ordered.map((member, index) => ({ ...member, version: index + 1 })),
    });
  }
  return result;
}

/**
 * Source holding the maximum preferredWeight; the earliest submission wins ties
 */
function preferredSource(groups: readonly SourceGroup[]): string | null {
  let best: VersionedSubmission | null = null;
  for (const group of groups) {
    for (const submission of group.versions) {
      if (
        best === null ||
        submission.raw.preferredWeight > best.raw.preferredWeight ||
        (submission.raw.preferredWeight === best.raw.preferredWeight &&
          submission.inputIndex < best.inputIndex)
      ) {
        best = submission;
      }
    }
  }
  return best?.raw.source ?? null;
}

function selectVersions(
  versions: readonly VersionedSubmission[],
  selector: VersionSelector
): VersionedSubmission[] {
  const first = versions[0];
  const last = versions[versions.length - 1];
  switch (selector) {
    case 'all':
      return [...versions];
    case 'first':
      return first ? [first] : [];
    case 'last':
      return last ? [last] : [];
    case 'preferred': {
      let best: VersionedSubmission | null = null;
      for (const candidate of versions) {
        if (best === null || comparePreference(candidate, best) > 0) {
          best = candidate;
        }
      }
      return best ? [best] : [];
    }
  }
}

function comparePreference(a: VersionedSubmission, b: VersionedSubmission): number {
  return (
    a.raw.preferredWeight - b.raw.preferredWeight ||
    a.raw.updateTime - b.raw.updateTime ||
    a.inputIndex - b.inputIndex
  );
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Resolve product versions of one type
 *
 * @param versionSelector - 'preferred' | 'first' | 'last' | 'all'
 * @throws {UndefinedVersionError} For any other version selector
 * @throws {ProductNotFoundError} When the type has no live submissions, or
 *   the named source contributed none
 */
export function resolveProducts(
  event: ProductSubmissions,
  productType: string,
  sourceSelector: SourceSelector = 'preferred',
  versionSelector: string = 'preferred'
): ResolvedProduct[] {
  if (!isVersionSelector(versionSelector)) {
    throw new UndefinedVersionError(versionSelector);
  }

  const groups = assignVersions(event.getRawProducts(productType));
  if (groups.length === 0) {
    throw new ProductNotFoundError(
      `Event ${event.id} has no product of type ${productType}`,
      productType
    );
  }

  let selected: readonly SourceGroup[];
  if (sourceSelector === 'all') {
    selected = groups;
  } else {
    const source = sourceSelector === 'preferred' ? preferredSource(groups) : sourceSelector;
    selected = groups.filter((group) => group.source === source);
    if (selected.length === 0) {
      throw new ProductNotFoundError(
        `No ${productType} products found for source "${sourceSelector}" in event ${event.id}`,
        productType,
        sourceSelector
      );
    }
  }

  const resolved: ResolvedProduct[] = [];
  for (const group of selected) {
    const chosen = selectVersions(group.versions, versionSelector).sort(
      (a, b) => a.version - b.version
    );
    for (const submission of chosen) {
      resolved.push(new ResolvedProduct(submission.raw, submission.version));
    }
  }
  return resolved;
}
