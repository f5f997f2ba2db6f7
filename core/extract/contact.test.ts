import { describe, expect, it } from "vitest";

import {
  extractContactInfo,
  extractEmail,
  extractGithub,
  extractLinkedin,
  extractName,
  extractPhone,
} from "./contact";

describe("extractEmail", () => {
  it("returns the first address without trailing punctuation", () => {
    expect(extractEmail("Contact: jane.doe+jobs@mail.example.com.")).toBe("jane.doe+jobs@mail.example.com");
    expect(extractEmail("no address here")).toBeNull();
  });
});

describe("extractPhone", () => {
  it("accepts country code and parenthesized area code", () => {
    expect(extractPhone("Phone: +1 (555) 123-4567")).toBe("+1 (555) 123-4567");
  });

  it("accepts dotted groups", () => {
    expect(extractPhone("555.123.4567")).toBe("555.123.4567");
  });

  it("ignores short digit runs such as ids and years", () => {
    expect(extractPhone("Employee ID 12345, 2019-2020")).toBeNull();
  });
});

describe("extractLinkedin", () => {
  it("reports the canonical profile path", () => {
    expect(extractLinkedin("https://www.linkedin.com/in/jane-doe-42/")).toBe("linkedin.com/in/jane-doe-42");
    expect(extractLinkedin("linkedin.com/company/acme")).toBeNull();
  });
});

describe("extractGithub", () => {
  it("skips reserved GitHub paths", () => {
    expect(extractGithub("see https://github.com/topics/python and github.com/janedoe")).toBe("github.com/janedoe");
  });

  it("falls back to a labelled handle", () => {
    expect(extractGithub("GitHub: jdoe-dev")).toBe("github.com/jdoe-dev");
  });

  it("returns null when absent", () => {
    expect(extractGithub("Python developer")).toBeNull();
  });
});

describe("extractName", () => {
  it("skips resume banners and accepts initials", () => {
    expect(extractName("RESUME\nJane Q. Doe\njane@x.io")).toBe("Jane Q. Doe");
  });

  it("skips section headers", () => {
    expect(extractName("Work Experience\nJohn Smith")).toBe("John Smith");
  });

  it("only looks at the first five lines", () => {
    expect(extractName("a\nb\nc\nd\ne\nJohn Smith")).toBeNull();
  });

  it("returns null for lowercase lines", () => {
    expect(extractName("jane doe\nworks at acme")).toBeNull();
  });
});

describe("extractContactInfo", () => {
  it("leaves unrecognized fields null", () => {
    expect(extractContactInfo("Jane Doe\njane@example.com")).toEqual({
      name: "Jane Doe",
      email: "jane@example.com",
      phone: null,
      linkedin: null,
      github: null,
    });
  });
});
