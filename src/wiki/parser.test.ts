import { describe, it, expect } from "vitest";
import type { RenderCallbacks } from "../types";
import { WikiParser, collectLinks } from "./parser";

// Callbacks that show what the parser asked for
const callbacks: RenderCallbacks = {
  link: (address, label, _cssClass, imageMarkup) =>
    `[${address}|${label ?? ""}|${imageMarkup ?? ""}]`,
  image: (address, alt) => `{${address}|${alt}}`,
  math: (text, display) => (display ? `$$${text}$$` : `$${text}$`),
};

function render(text: string): string {
  return Array.from(new WikiParser().parse(text, callbacks)).join("");
}

describe("WikiParser", () => {
  describe("blocks", () => {
    it("renders headings with numbered anchors and line ids", () => {
      expect(render("= A =\n== B ==")).toBe(
        '<a name="head-1"></a><h1 id="line_1">A</h1>' +
          '<a name="head-2"></a><h2 id="line_2">B</h2>',
      );
    });

    it("joins consecutive lines into one paragraph", () => {
      expect(render("= Title =\n\nHello **world**\nagain")).toBe(
        '<a name="head-1"></a><h1 id="line_1">Title</h1>' +
          '<p id="line_3">Hello <strong>world</strong>\nagain</p>',
      );
    });

    it("renders bulleted and numbered lists", () => {
      expect(render("* one\n* two\n# three")).toBe(
        '<ul id="line_1"><li>one</li><li>two</li></ul>' +
          '<ol id="line_3"><li>three</li></ol>',
      );
    });

    it("renders quotes and rules", () => {
      expect(render("> a\n> b\n----")).toBe(
        '<blockquote id="line_1">a\nb</blockquote><hr>',
      );
    });

    it("splits table cells outside links", () => {
      expect(render("|a|[[X|y]]|\n|c|d|")).toBe(
        '<table id="line_1">' +
          "<tr><td>a</td><td>[X|y|]</td></tr>" +
          "<tr><td>c</td><td>d</td></tr>" +
          "</table>",
      );
    });

    it("escapes preformatted blocks", () => {
      expect(render("{{{\n<b>x</b>\n}}}")).toBe(
        '<pre class="code" id="line_1">&lt;b&gt;x&lt;/b&gt;</pre>',
      );
    });

    it("passes math blocks to the math callback", () => {
      expect(render("{{{#!math\nx^2\n}}}")).toBe(
        '<div id="line_1">$$x^2$$</div>',
      );
    });
  });

  describe("inline markup", () => {
    it("delegates links, images and math to the callbacks", () => {
      expect(render("See [[Page|label]] and {{pic.png|alt}} and $$x$$")).toBe(
        '<p id="line_1">See [Page|label|] and {pic.png|alt} and $x$</p>',
      );
    });

    it("renders emphasis and code", () => {
      expect(render("//it// ##c## {{{m}}} a\\\\b")).toBe(
        '<p id="line_1"><em>it</em> <code>c</code> <code>m</code> a<br>b</p>',
      );
    });

    it("links bare URLs without trailing punctuation", () => {
      expect(render("Go to http://example.com/a.")).toBe(
        '<p id="line_1">Go to [http://example.com/a||].</p>',
      );
    });

    it("renders an image used as a link label", () => {
      expect(render("[[Page|{{pic.png|Alt}}]]")).toBe(
        '<p id="line_1">[Page|Alt|{pic.png|Alt}]</p>',
      );
    });

    it("escapes plain text", () => {
      expect(render("a < b & c")).toBe('<p id="line_1">a &lt; b &amp; c</p>');
    });
  });
});

describe("collectLinks", () => {
  it("lists links and images in document order", () => {
    const links = collectLinks(
      new WikiParser(),
      "[[A]] {{b.png}}\n\n* [[:wp:X|y]] http://example.com",
    );

    expect(links).toEqual([
      { address: "A", label: undefined, image: false },
      { address: "b.png", label: "b.png", image: true },
      { address: ":wp:X", label: "y", image: false },
      { address: "http://example.com", label: undefined, image: false },
    ]);
  });
});
