/**
 * Placement Rule: Categories
 *
 * Topic pages (GRE prep, PhD admin, reading lists, conferences) get a
 * category directory. Applies to already-placed titles too.
 */

import { CATEGORIES, type CategoryMatch } from "../patterns";
import type { PlacementRule } from "../types";

function matches(title: string, match: CategoryMatch): boolean {
  switch (match.type) {
    case "prefix":
      return title.startsWith(match.value);
    case "substring":
      return title.includes(match.value);
    case "any-prefix":
      return match.values.some((value) => title.startsWith(value));
  }
}

export const categoryRule: PlacementRule = {
  kind: "category",
  apply(title) {
    const category = CATEGORIES.find(({ match }) => matches(title, match));
    return category ? `${category.directory}/${title}` : title;
  },
};
