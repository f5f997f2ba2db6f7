import { describe, expect, it } from "vitest";

import { buildSkillTaxonomy } from "../config/taxonomy";
import { extractCertifications, extractEducation, findDegreeMentions } from "./education";

describe("findDegreeMentions", () => {
  it("lists mentions in text order", () => {
    expect(findDegreeMentions("B.S. in Computer Science, 2014\nM.S. in Data Science, 2016")).toEqual([
      { text: "B.S.", level: "bachelors" },
      { text: "M.S.", level: "masters" },
    ]);
  });

  it("keeps both spellings of the same degree", () => {
    expect(findDegreeMentions("Master of Business Administration (MBA)")).toEqual([
      { text: "Master of", level: "masters" },
      { text: "MBA", level: "masters" },
    ]);
  });

  it("accepts a bare Master before in or degree", () => {
    expect(findDegreeMentions("Master in Computer Science, MIT")).toEqual([{ text: "Master", level: "masters" }]);
    expect(findDegreeMentions("Master Degree in Finance")).toEqual([{ text: "Master", level: "masters" }]);
    expect(findDegreeMentions("Masters in Economics")).toEqual([{ text: "Masters", level: "masters" }]);
    expect(findDegreeMentions("Certified Scrum Master")).toEqual([]);
  });

  it("recognizes doctorates and associate degrees", () => {
    expect(findDegreeMentions("Ph.D. in Physics")).toEqual([{ text: "Ph.D.", level: "doctorate" }]);
    expect(findDegreeMentions("Associate Degree in Web Development")).toEqual([
      { text: "Associate Degree", level: "associate" },
    ]);
  });

  it("does not read product names as degrees", () => {
    expect(findDegreeMentions("Proficient in MS Office and Excel")).toEqual([]);
    expect(findDegreeMentions("built a BS detector")).toEqual([]);
  });

  it("accepts a bare BS followed by a field", () => {
    expect(findDegreeMentions("BS, Mathematics")).toEqual([{ text: "BS", level: "bachelors" }]);
  });
});

describe("extractEducation", () => {
  it("reports the highest level and whether it is a degree", () => {
    const rec = extractEducation("High School Diploma\nBachelor of Science in Biology\nMS in Statistics");
    expect(rec.highest_level).toBe("masters");
    expect(rec.has_degree).toBe(true);
    expect(rec.degree_mentions.map((d) => d.level)).toEqual(["high_school", "bachelors", "masters"]);
  });

  it("treats high school as no degree", () => {
    expect(extractEducation("High School Diploma")).toEqual({
      highest_level: "high_school",
      has_degree: false,
      degree_mentions: [{ text: "High School", level: "high_school" }],
    });
  });

  it("defaults to none", () => {
    expect(extractEducation("Self-taught developer")).toEqual({
      highest_level: "none",
      has_degree: false,
      degree_mentions: [],
    });
  });
});

describe("extractCertifications", () => {
  const taxonomy = buildSkillTaxonomy({
    version: "test-1",
    categories: { languages: ["Python"] },
    certifications: ["AWS Certified Solutions Architect", "PMP", "CSM"],
  });

  it("lists known names first, then uncovered section lines", () => {
    const text = [
      "Jane Doe",
      "Certifications",
      "AWS Certified Solutions Architect - Associate",
      "PMP",
      "Google Analytics Individual Qualification",
      "Skills",
      "Python",
    ].join("\n");

    expect(extractCertifications(text, taxonomy)).toEqual([
      "AWS Certified Solutions Architect",
      "PMP",
      "Google Analytics Individual Qualification",
    ]);
  });

  it("returns an empty list when nothing is found", () => {
    expect(extractCertifications("Python developer", taxonomy)).toEqual([]);
  });
});
