import { describe, it, expect } from "vitest";
import { encodePathSegment, titleToPath } from "./encode-path";
import { TitleDecompositionError } from "./errors";

describe("encodePathSegment", () => {
  it("keeps letters, digits, spaces and -_.", () => {
    expect(encodePathSegment("Week 2_notes-v1.0")).toBe("Week 2_notes-v1.0");
  });

  it("escapes parentheses", () => {
    expect(encodePathSegment("Search (AI)")).toBe("Search %28AI%29");
  });

  it("escapes reserved characters with uppercase hex", () => {
    expect(encodePathSegment("Notes: 2017")).toBe("Notes%3A 2017");
    expect(encodePathSegment("a~b!c*d'e")).toBe("a%7Eb%21c%2Ad%27e");
    expect(encodePathSegment("50%?")).toBe("50%25%3F");
  });

  it("encodes non-ASCII characters as UTF-8", () => {
    expect(encodePathSegment("café")).toBe("caf%C3%A9");
  });
});

describe("titleToPath", () => {
  it("encodes each segment and joins with /", () => {
    expect(titleToPath("Courses/ANU/COMP3620/Search (AI)")).toBe(
      "Courses/ANU/COMP3620/Search %28AI%29",
    );
  });

  it("drops empty segments", () => {
    expect(titleToPath("COMP3620//Search (AI)/")).toBe(
      "COMP3620/Search %28AI%29",
    );
    expect(titleToPath("/Root/Notes")).toBe("Root/Notes");
  });

  it("throws when no segment survives", () => {
    expect(() => titleToPath("")).toThrow(TitleDecompositionError);
    expect(() => titleToPath("//")).toThrow(
      "Couldn't extract path segments from title '//'",
    );
  });
});
