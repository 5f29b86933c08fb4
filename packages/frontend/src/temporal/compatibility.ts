/**
 * Compatibility table
 *
 * For every target type, the source types that can never supply the fields
 * the target needs. A `Target.from(source)` call over such a pair always
 * throws at runtime.
 *
 * The data file is written per source type ("a DayOfWeek cannot produce any
 * of these"), which is how the calendar relationships are easiest to review.
 * Lookups go the other way, so the table is inverted once on construction.
 *
 * Targets with no incompatible sources are not proofs of validity. The two
 * full date-time-with-offset types are listed with no entries as sources and
 * that gap is kept as is.
 */

import conversions from "./incompatible-conversions.json" with { type: "json" };
import {
  TEMPORAL_TYPE_TAGS,
  type TemporalTypeTag,
  isTemporalTypeTag,
} from "./tags.js";

/**
 * Source tag -> targets the source cannot produce
 */
export type IncompatibleConversionData = Readonly<
  Record<string, readonly string[]>
>;

export type IncompatiblePair = {
  readonly target: TemporalTypeTag;
  readonly source: TemporalTypeTag;
};

export type CompatibilityTable = {
  readonly isKnownIncompatible: (
    target: TemporalTypeTag,
    source: TemporalTypeTag
  ) => boolean;
  readonly incompatibleSourcesFor: (
    target: TemporalTypeTag
  ) => ReadonlySet<TemporalTypeTag>;
  readonly listIncompatiblePairs: () => readonly IncompatiblePair[];
  readonly size: number;
};

export class CompatibilityTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CompatibilityTableError";
  }
}

const EMPTY: ReadonlySet<TemporalTypeTag> = new Set();

const tagOrder = (tag: TemporalTypeTag): number =>
  TEMPORAL_TYPE_TAGS.indexOf(tag);

/**
 * Build an immutable table from per-source data.
 * Throws CompatibilityTableError on unknown tags, self pairs or duplicates.
 */
export const createCompatibilityTable = (
  data: IncompatibleConversionData
): CompatibilityTable => {
  const byTarget = new Map<TemporalTypeTag, Set<TemporalTypeTag>>();
  let size = 0;

  for (const [source, targets] of Object.entries(data)) {
    if (!isTemporalTypeTag(source)) {
      throw new CompatibilityTableError(`Unknown source type '${source}'`);
    }

    for (const target of targets) {
      if (!isTemporalTypeTag(target)) {
        throw new CompatibilityTableError(
          `Unknown target type '${target}' listed for '${source}'`
        );
      }
      if (target === source) {
        throw new CompatibilityTableError(
          `Self conversion '${source}' must not be listed`
        );
      }

      const sources: Set<TemporalTypeTag> =
        byTarget.get(target) ?? new Set<TemporalTypeTag>();
      if (sources.has(source)) {
        throw new CompatibilityTableError(
          `Duplicate entry '${target}' for '${source}'`
        );
      }
      sources.add(source);
      byTarget.set(target, sources);
      size++;
    }
  }

  const pairs: readonly IncompatiblePair[] = Object.freeze(
    [...byTarget.entries()]
      .flatMap(([target, sources]) =>
        [...sources].map((source) => ({ target, source }))
      )
      .sort(
        (a, b) =>
          tagOrder(a.target) - tagOrder(b.target) ||
          tagOrder(a.source) - tagOrder(b.source)
      )
  );

  return Object.freeze({
    isKnownIncompatible: (target: TemporalTypeTag, source: TemporalTypeTag) =>
      byTarget.get(target)?.has(source) ?? false,
    incompatibleSourcesFor: (target: TemporalTypeTag) =>
      byTarget.get(target) ?? EMPTY,
    listIncompatiblePairs: () => pairs,
    size,
  });
};

/**
 * The built-in table, shared by every evaluation
 */
export const COMPATIBILITY_TABLE: CompatibilityTable =
  createCompatibilityTable(conversions);

export const isKnownIncompatible = (
  target: TemporalTypeTag,
  source: TemporalTypeTag
): boolean => COMPATIBILITY_TABLE.isKnownIncompatible(target, source);
