import { describe, expect, it } from "vitest";

import { findTermHits, maskLinks } from "./terms";

const entry = (term: string) => ({ term, value: term });

describe("findTermHits", () => {
  it("does not match a term inside a longer word", () => {
    const hits = findTermHits("I use JavaScript and Java", [entry("Java"), entry("JavaScript")]);
    expect(hits.map((h) => h.value)).toEqual(["JavaScript", "Java"]);
    expect(hits.map((h) => h.start)).toEqual([6, 21]);
  });

  it("lets longer terms claim their span first", () => {
    const hits = findTermHits("React Native and React", [entry("React"), entry("React Native")]);
    expect(hits.map((h) => h.value)).toEqual(["React Native", "React"]);
  });

  it("matches regardless of case", () => {
    const hits = findTermHits("aws, Aws and AWS", [entry("AWS")]);
    expect(hits.map((h) => h.text)).toEqual(["aws", "Aws", "AWS"]);
    expect(hits.every((h) => h.value === "AWS")).toBe(true);
  });

  it("does not match one- or two-character terms glued into R&D or Go-to", () => {
    const text = "Led the R&D group. Go-to person. R, Go";
    const hits = findTermHits(text, [entry("R"), entry("Go")]);
    expect(hits.map((h) => h.value)).toEqual(["R", "Go"]);
    expect(hits[0].start).toBe(text.indexOf("R, Go"));
  });

  it("lets a rejected occurrence leave its span unclaimed", () => {
    const hits = findTermHits("React Native", [entry("React Native"), entry("React")], (e) => e.term !== "React Native");
    expect(hits.map((h) => h.value)).toEqual(["React"]);
  });

  it("lets whitespace inside a term span line breaks", () => {
    const hits = findTermHits("Machine\nLearning", [entry("Machine Learning")]);
    expect(hits.map((h) => h.text)).toEqual(["Machine\nLearning"]);
  });

  it("handles symbols in terms", () => {
    expect(findTermHits("C++ and C", [entry("C++")]).map((h) => h.start)).toEqual([0]);
  });
});

describe("maskLinks", () => {
  it("blanks emails and URLs without shifting offsets", () => {
    const text = "mail jane@x.io or see https://github.com/jane now";
    expect(maskLinks(text)).toBe("mail " + " ".repeat(9) + " or see " + " ".repeat(23) + " now");
  });
});
