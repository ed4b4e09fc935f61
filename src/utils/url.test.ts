import { describe, it, expect } from "vitest";
import { fixUrl, isExternalLink } from "./url";

describe("isExternalLink", () => {
  it("recognizes scheme URLs and mailto", () => {
    expect(isExternalLink("https://example.com")).toBe(true);
    expect(isExternalLink("ftp://example.com/file")).toBe(true);
    expect(isExternalLink("mailto:someone@example.com")).toBe(true);
  });

  it("treats page titles and aliases as internal", () => {
    expect(isExternalLink("Search (AI)")).toBe(false);
    expect(isExternalLink(":wp:Graph")).toBe(false);
    expect(isExternalLink("Notes: 2017")).toBe(false);
    expect(isExternalLink("#top")).toBe(false);
  });
});

describe("fixUrl", () => {
  it("encodes spaces and non-ASCII characters", () => {
    expect(fixUrl("http://example.com/a b")).toBe("http://example.com/a%20b");
    expect(fixUrl("http://example.com/ü")).toBe("http://example.com/%C3%BC");
  });

  it("keeps existing escapes and reserved characters", () => {
    expect(fixUrl("http://example.com/a%20b?q=1#x")).toBe(
      "http://example.com/a%20b?q=1#x",
    );
  });

  it("escapes a stray percent sign", () => {
    expect(fixUrl("100%")).toBe("100%25");
  });
});
