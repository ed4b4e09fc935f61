import type {
  AliasTable,
  PageStorage,
  RenderCallbacks,
  Title,
} from "../types";
import { expandAlias } from "./alias-table";
import { escapeHtml } from "./escape-html";
import type { PathResolver } from "./path-resolver";
import type { Tracker } from "./tracker";
import { fixUrl, isExternalLink } from "./url";

/**
 * Options for rendering one page's links
 */
export interface LinkRendererOptions {
  /** The page being rendered; relative links start from its directory */
  pageTitle: Title;
  resolver: PathResolver;
  storage: Pick<PageStorage, "pageExists" | "pageMimeType">;
  aliases: AliasTable;
  /** Link target when an alias cannot be expanded */
  aliasPage: Title;
  tracker?: Tracker;
}

/**
 * Link, image and math callbacks for the markup parser
 * One instance per rendered page; internal links point at the relative
 * path of their target's output file.
 */
export class LinkRenderer implements RenderCallbacks {
  private readonly pageTitle: Title;
  private readonly resolver: PathResolver;
  private readonly storage: Pick<PageStorage, "pageExists" | "pageMimeType">;
  private readonly aliases: AliasTable;
  private readonly aliasPage: Title;
  private readonly tracker?: Tracker;

  constructor(options: LinkRendererOptions) {
    this.pageTitle = options.pageTitle;
    this.resolver = options.resolver;
    this.storage = options.storage;
    this.aliases = options.aliases;
    this.aliasPage = options.aliasPage;
    this.tracker = options.tracker;
  }

  link(
    address: string,
    label?: string,
    cssClass?: string,
    imageMarkup?: string,
  ): string {
    let addr = address.trim();
    let text = escapeHtml(label || addr);
    let chunk = "";
    let href: string;
    const classes = cssClass ? [cssClass] : [];

    if (isExternalLink(addr)) {
      classes.push("external");
      if (addr.startsWith("mailto:")) {
        // Obfuscate addresses a little against scrapers
        classes.push("mail");
        text = text.replace(/@/g, "&#64;").replace(/\./g, "&#46;");
        href = escapeHtml(addr, true).replace(/@/g, "%40").replace(/\./g, "%2E");
      } else {
        href = escapeHtml(fixUrl(addr), true);
      }
    } else {
      const hash = addr.indexOf("#");
      if (hash !== -1) {
        chunk = "#" + fixUrl(addr.slice(hash + 1));
        addr = addr.slice(0, hash);
      }

      if (addr.startsWith(":")) {
        href = escapeHtml(fixUrl(this.aliasLink(addr.slice(1))) + chunk, true);
        classes.push("external", "alias");
      } else if (addr === "") {
        href = escapeHtml(chunk, true);
        classes.push("anchor");
      } else {
        classes.push("wiki");
        href = escapeHtml(
          this.resolver.relativeReference(this.pageTitle, addr) + chunk,
          true,
        );
        this.tracker?.incrementInternalLinks();
        if (!this.storage.pageExists(addr)) {
          classes.push("nonexistent");
          this.tracker?.trackMissingTarget(addr, this.pageTitle);
        }
      }
    }

    const classList = escapeHtml(classes.join(" "), true);
    const title = escapeHtml(addr + chunk, true);
    // Built by hand so the href is not escaped twice
    return `<a href="${href}" class="${classList}" title="${title}">${imageMarkup || text}</a>`;
  }

  image(address: string, alt: string, cssClass: string = "wiki"): string {
    let addr = address.trim();
    let chunk = "";

    if (isExternalLink(addr)) {
      return img({ src: fixUrl(addr), class: "external", alt });
    }

    const hash = addr.indexOf("#");
    if (hash !== -1) {
      chunk = addr.slice(hash + 1);
      addr = addr.slice(0, hash);
    }

    if (addr === "") {
      return `<a name="${escapeHtml(chunk, true)}"></a>`;
    }

    if (addr.startsWith(":")) {
      const fragment = chunk ? "#" + chunk : "";
      const src = fixUrl(this.aliasLink(addr.slice(1)) + fragment);
      return img({ src, class: "external alias", alt });
    }

    const reference = this.resolver.relativeReference(this.pageTitle, addr);
    this.tracker?.incrementInternalLinks();

    if (this.storage.pageExists(addr)) {
      if (this.storage.pageMimeType(addr).startsWith("image/")) {
        return img({ src: reference, class: cssClass, alt });
      }
      // Non-image files keep the old "href on <img>" markup downstream tools expect
      return img({ href: reference, alt });
    }

    this.tracker?.trackMissingTarget(addr, this.pageTitle);
    return `<a href="${escapeHtml(reference, true)}">${escapeHtml(alt)}</a>`;
  }

  /**
   * Math is left as TeX between dollar delimiters for a later typesetting step
   */
  math(text: string, display: boolean): string {
    if (display) {
      return escapeHtml(`$$\n${text}\n$$`);
    }
    return escapeHtml(`$${text}$`);
  }

  private aliasLink(shorthand: string): string {
    const expansion = expandAlias(shorthand, this.aliases);
    if (expansion.resolved) {
      return expansion.url;
    }
    this.tracker?.trackLinkIssue(
      this.pageTitle,
      expansion.reason,
      ":" + shorthand,
    );
    return this.aliasPage;
  }
}

function img(attributes: Record<string, string>): string {
  const rendered = Object.entries(attributes)
    .map(([name, value]) => ` ${name}="${escapeHtml(value, true)}"`)
    .join("");
  return `<img${rendered}>`;
}
