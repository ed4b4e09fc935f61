/**
 * Placement Rule: Backlinks
 *
 * A flat page linked from a single "family" of pages moves under the
 * family's root. "Search (AI)" linked from "COMP3620" and "COMP3620Revision"
 * becomes "COMP3620/Search (AI)". Pages linked from a course homepage go to
 * that course, the lexically smallest one when there are several.
 */

import type { Title } from "../../types";
import { ANU_COURSE_EXACT } from "../patterns";
import type { PlacementRule } from "../types";

/**
 * Shorter wins, equal lengths break ties lexically
 */
function isShorter(candidate: Title, current: Title): boolean {
  if (candidate.length !== current.length) {
    return candidate.length < current.length;
  }
  return candidate < current;
}

export const backlinksRule: PlacementRule = {
  kind: "backlinks",
  apply(title, { backlinks, frontPage }) {
    if (title.includes("/")) {
      return title;
    }

    const sources = [...backlinks.backlinksOf(title)];
    let shortest: Title | null = null;
    let course: Title | null = null;

    for (const source of sources) {
      if (shortest === null || isShorter(source, shortest)) {
        shortest = source;
      }
      if (ANU_COURSE_EXACT.test(source) && (course === null || source <= course)) {
        course = source;
      }
    }

    if (shortest === null || shortest === frontPage) {
      return title;
    }

    if (course !== null) {
      return `${course}/${title}`;
    }

    // Backlinks from unrelated pages: no single context to place it in
    const root = shortest;
    if (!sources.every((source) => source.startsWith(root))) {
      return title;
    }

    return `${root}/${title}`;
  },
};
