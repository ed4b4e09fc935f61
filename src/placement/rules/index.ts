/**
 * Placement Rules Index
 * The chain order is part of the contract: each rule sees the previous
 * rule's output.
 */

import type { PlacementRule } from "../types";
import { backlinksRule } from "./backlinks";
import { staticPrefixRule } from "./static-prefix";
import { courseRule } from "./course";
import { categoryRule } from "./category";
import { defaultRule } from "./default";

export { backlinksRule, staticPrefixRule, courseRule, categoryRule, defaultRule };

export const PLACEMENT_RULES: readonly PlacementRule[] = [
  backlinksRule,
  staticPrefixRule,
  courseRule,
  categoryRule,
  defaultRule,
];
