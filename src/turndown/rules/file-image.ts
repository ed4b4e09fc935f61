/**
 * Turndown Rule: File Images
 *
 * Links to stored files that are not images are rendered as <img> tags
 * carrying an href instead of a src. Turndown's image rule would turn
 * those into "![alt]()"; emit a plain link to the file instead.
 */

import type TurndownService from "turndown";

export function fileImageRule() {
  return (service: TurndownService): void => {
    service.addRule("fileImage", {
      filter: (node) =>
        node.nodeName === "IMG" &&
        !node.getAttribute("src") &&
        Boolean(node.getAttribute("href")),
      replacement: (_content, node) => {
        const href = node.getAttribute("href") ?? "";
        const alt = node.getAttribute("alt") || href;
        return `[${alt}](${href})`;
      },
    });
  };
}
