/**
 * Title patterns used by the placement rules
 * These follow the naming habits of a single personal wiki: course codes
 * from two universities, conference names and a few topic prefixes.
 */

// ANU course code, e.g. "COMP3620"
export const ANU_COURSE = String.raw`(COMP|ENGN|MATH|STAT)\d{4}`;

// Berkeley course code, e.g. "CS188", "EE126-2", "STAT210a"
export const BERKELEY_COURSE = String.raw`(CS|STAT|EE)\d{3}(-\d+)?[a-zA-Z]?`;

export const ANU_COURSE_PREFIX = new RegExp(`^${ANU_COURSE}`);
export const ANU_COURSE_EXACT = new RegExp(`^${ANU_COURSE}$`);
export const BERKELEY_COURSE_PREFIX = new RegExp(`^${BERKELEY_COURSE}`);

/**
 * Prefixes that become a directory of their own ("HMU Notes" -> "HMU/Notes")
 * Tried in order; the first whose remainder is non-empty wins.
 */
export const STATIC_PREFIXES: readonly RegExp[] = [
  ANU_COURSE_PREFIX,
  /^HMU/,
  /^IJCAI17/,
  /^AAAI/,
];

export const CONFERENCE_PREFIXES: readonly string[] = [
  "ICLR",
  "AAAI",
  "IJCAI",
  "ICAPS",
  "CHAIWorkshop",
  "CognitiveRobotics",
  "DICTA",
];

export type CategoryMatch =
  | { type: "prefix"; value: string }
  | { type: "substring"; value: string }
  | { type: "any-prefix"; values: readonly string[] };

/**
 * Category directories, checked in order
 */
export const CATEGORIES: ReadonlyArray<{
  match: CategoryMatch;
  directory: string;
}> = [
  { match: { type: "prefix", value: "GRE" }, directory: "GRE" },
  { match: { type: "substring", value: "PhD" }, directory: "PhD" },
  {
    match: { type: "prefix", value: "WainwrightJordan" },
    directory: "ReadingList",
  },
  {
    match: { type: "any-prefix", values: CONFERENCE_PREFIXES },
    directory: "Conferences",
  },
];
