/**
 * Placement Rule: Static Prefixes
 *
 * Titles that open with a known prefix are split after it:
 * "COMP3620 Exam Notes" -> "COMP3620/Exam Notes".
 */

import { STATIC_PREFIXES } from "../patterns";
import type { PlacementRule } from "../types";

export const staticPrefixRule: PlacementRule = {
  kind: "static-prefix",
  apply(title) {
    if (title.includes("/")) {
      return title;
    }

    for (const pattern of STATIC_PREFIXES) {
      const match = pattern.exec(title);
      if (!match) continue;

      const prefix = title.slice(0, match[0].length);
      const rest = title.slice(match[0].length).trim();
      if (rest) {
        return `${prefix}/${rest}`;
      }
    }

    return title;
  },
};
