/**
 * Errors that abort a conversion run
 */

import type { Title } from "../types";

/**
 * A title with no usable path segments ("", "/", "//")
 * Indicates a systemic title-shape problem, so it is never recovered per page.
 */
export class TitleDecompositionError extends Error {
  constructor(readonly title: Title) {
    super(`Couldn't extract path segments from title '${title}'`);
    this.name = "TitleDecompositionError";
  }
}

/**
 * Wraps whatever went wrong while converting one page
 */
export class PageConversionError extends Error {
  constructor(
    readonly title: Title,
    options: { cause: unknown },
  ) {
    const reason =
      options.cause instanceof Error
        ? options.cause.message
        : String(options.cause);
    super(`Failed to convert page '${title}': ${reason}`, options);
    this.name = "PageConversionError";
  }
}
