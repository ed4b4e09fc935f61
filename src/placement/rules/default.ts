import type { PlacementRule } from "../types";

// Everything ends up in some directory
export const defaultRule: PlacementRule = {
  kind: "default",
  apply(title) {
    return title.includes("/") ? title : `Root/${title}`;
  },
};
