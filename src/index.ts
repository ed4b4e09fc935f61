/**
 * Library entry point
 */

export { Converter } from "./converter";
export type { ConverterOptions } from "./converter";
export { placeTitle, PLACEMENT_RULES } from "./placement";
export type { PlacementContext, PlacementRule } from "./placement";
export {
  BacklinkIndex,
  DirectoryStorage,
  WikiParser,
  collectLinks,
} from "./wiki";
export {
  LinkRenderer,
  PathResolver,
  loadConfig,
  renderPage,
  scrubHtml,
  titleToPath,
} from "./utils";
export type * from "./types";
