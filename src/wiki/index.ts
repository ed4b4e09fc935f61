/**
 * Wiki collaborators: storage, link graph and markup parser
 */

export { DirectoryStorage } from "./directory-storage";
export { BacklinkIndex, linkTarget } from "./backlink-index";
export { WikiParser, collectLinks } from "./parser";
export type { CollectedLink } from "./parser";
