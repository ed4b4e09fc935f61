/**
 * Placement rule types
 */

import type { BacklinkLookup, Title } from "../types";

export type PlacementRuleKind =
  | "backlinks"
  | "static-prefix"
  | "course"
  | "category"
  | "default";

/**
 * Read-only inputs shared by every rule
 */
export interface PlacementContext {
  backlinks: BacklinkLookup;
  /** Pages linked only from here are left where they are */
  frontPage: Title;
}

/**
 * One step of the placement chain
 * `apply` is total: it returns the title unchanged when the rule does not fire.
 */
export interface PlacementRule {
  kind: PlacementRuleKind;
  apply(title: Title, ctx: PlacementContext): Title;
}
