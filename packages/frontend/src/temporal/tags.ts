/**
 * Temporal type family
 *
 * The closed set of date/time value types the checker knows about. The
 * first thirteen come from the primary calendar library, the last six from
 * its extension library.
 */

export const PRIMARY_TEMPORAL_TYPE_TAGS = [
  "Instant",
  "LocalDate",
  "LocalDateTime",
  "LocalTime",
  "Month",
  "MonthDay",
  "OffsetDateTime",
  "OffsetTime",
  "Year",
  "YearMonth",
  "ZonedDateTime",
  "ZoneOffset",
  "DayOfWeek",
] as const;

export const EXTRA_TEMPORAL_TYPE_TAGS = [
  "AmPm",
  "DayOfMonth",
  "DayOfYear",
  "Quarter",
  "YearQuarter",
  "YearWeek",
] as const;

export const TEMPORAL_TYPE_TAGS = Object.freeze([
  ...PRIMARY_TEMPORAL_TYPE_TAGS,
  ...EXTRA_TEMPORAL_TYPE_TAGS,
]);

export type TemporalTypeTag = (typeof TEMPORAL_TYPE_TAGS)[number];

const TAG_SET: ReadonlySet<string> = new Set(TEMPORAL_TYPE_TAGS);

export const isTemporalTypeTag = (name: string): name is TemporalTypeTag =>
  TAG_SET.has(name);
