/**
 * Placement Chain
 * Decides which directory a page lands in from its title and backlinks
 */

import type { Title } from "../types";
import { PLACEMENT_RULES } from "./rules";
import type { PlacementContext } from "./types";

export * from "./rules";
export type { PlacementContext, PlacementRule, PlacementRuleKind } from "./types";

/**
 * Run a title through every placement rule in order
 *
 * @example
 * placeTitle("RandomNotes", ctx) // "Root/RandomNotes"
 * placeTitle("GREPrepNotes", ctx) // "GRE/GREPrepNotes"
 */
export function placeTitle(title: Title, ctx: PlacementContext): Title {
  return PLACEMENT_RULES.reduce((current, rule) => rule.apply(current, ctx), title);
}
