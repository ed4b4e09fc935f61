import { describe, it, expect } from "vitest";
import { scrubHtml } from "./scrub-html";

describe("scrubHtml", () => {
  it("removes classes, line ids and empty heading anchors", () => {
    const html =
      '<a name="head-1"></a><h1 id="line_1">Title</h1>' +
      '<p id="line_3" class="x">See <a href="a.html" class="wiki" title="A">A</a></p>';

    expect(scrubHtml(html)).toBe(
      '<h1>Title</h1><p>See <a href="a.html" title="A">A</a></p>',
    );
  });

  it("keeps other ids and anchors with content", () => {
    const html = '<h2 id="intro"><a name="head-2">Intro</a></h2>';
    expect(scrubHtml(html)).toBe(html);
  });

  it("leaves entities as written", () => {
    const html = "<p>a &amp; b &lt; c</p>";
    expect(scrubHtml(html)).toBe(html);
  });

  it("is idempotent", () => {
    const html =
      '<a name="head-1"></a><h1 id="line_1" class="t">T</h1><pre class="code" id="line_2">x &lt; y</pre>';
    const once = scrubHtml(html);
    expect(once).toBe("<h1>T</h1><pre>x &lt; y</pre>");
    expect(scrubHtml(once)).toBe(once);
  });
});
