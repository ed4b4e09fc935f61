/**
 * Placement Rule: Courses
 *
 * Course pages and everything already placed under a course go into a
 * per-university directory. Unlike the first two rules this one also
 * applies to titles that already contain "/".
 */

import { ANU_COURSE_PREFIX, BERKELEY_COURSE_PREFIX } from "../patterns";
import type { PlacementRule } from "../types";

export const courseRule: PlacementRule = {
  kind: "course",
  apply(title) {
    if (ANU_COURSE_PREFIX.test(title)) {
      return `Courses/ANU/${title}`;
    }
    if (BERKELEY_COURSE_PREFIX.test(title)) {
      return `Courses/Berkeley/${title}`;
    }
    return title;
  },
};
