import { describe, expect, it } from "vitest";

import { detectSectionRanges, linesOutsideSection, sectionOfHeader, sliceSection } from "./sections";

const lines = [
  "Jane Doe",
  "Summary",
  "Engineer",
  "Work Experience:",
  "Acme 2019 - 2020",
  "Education",
  "BS in CS",
  "Technical Skills",
  "Python",
];

describe("sectionOfHeader", () => {
  it("matches known headers case-insensitively with trailing punctuation", () => {
    expect(sectionOfHeader("EDUCATION")).toBe("education");
    expect(sectionOfHeader("Education -")).toBe("education");
    expect(sectionOfHeader("Licenses & Certifications")).toBe("certifications");
    expect(sectionOfHeader("Work Experience:")).toBe("experience");
  });

  it("rejects ordinary lines", () => {
    expect(sectionOfHeader("Experience with Python")).toBeNull();
    expect(sectionOfHeader("")).toBeNull();
  });
});

describe("detectSectionRanges", () => {
  it("runs each section until the next header", () => {
    expect(detectSectionRanges(lines)).toEqual([
      { name: "summary", start: 2, end: 3 },
      { name: "experience", start: 4, end: 5 },
      { name: "education", start: 6, end: 7 },
      { name: "skills", start: 8, end: 9 },
    ]);
  });

  it("keeps the first occurrence of a repeated header", () => {
    const ranges = detectSectionRanges(["Experience", "a", "Experience", "b"]);
    expect(ranges).toEqual([{ name: "experience", start: 1, end: 4 }]);
  });
});

describe("sliceSection / linesOutsideSection", () => {
  const ranges = detectSectionRanges(lines);

  it("returns the section body or null when absent", () => {
    expect(sliceSection(lines, ranges, "experience")).toEqual(["Acme 2019 - 2020"]);
    expect(sliceSection(lines, ranges, "projects")).toBeNull();
  });

  it("drops the section and its header", () => {
    expect(linesOutsideSection(lines, ranges, "education")).toEqual([
      "Jane Doe",
      "Summary",
      "Engineer",
      "Work Experience:",
      "Acme 2019 - 2020",
      "Technical Skills",
      "Python",
    ]);
  });
});
