/**
 * Path Encoder
 * Maps hierarchical page titles to filesystem-safe relative paths
 */

import type { Title } from "../types";
import { TitleDecompositionError } from "./errors";

/**
 * Percent-encode one path segment
 * Letters, digits, space, "_", "-" and "." stay as they are.
 *
 * @example
 * encodePathSegment("Search (AI)") // "Search %28AI%29"
 * encodePathSegment("Notes: 2017") // "Notes%3A 2017"
 */
export function encodePathSegment(segment: string): string {
  return encodeURIComponent(segment)
    .replace(/%20/g, " ")
    .replace(
      /[!'()*~]/g,
      (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`,
    );
}

/**
 * Split a title on "/", drop empty segments and encode the rest
 *
 * @throws TitleDecompositionError if no segment survives
 *
 * @example
 * titleToPath("COMP3620//Search (AI)/") // "COMP3620/Search %28AI%29"
 */
export function titleToPath(title: Title): string {
  const segments = title.split("/").filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new TitleDecompositionError(title);
  }
  return segments.map(encodePathSegment).join("/");
}
