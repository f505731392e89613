import { describe, expect, it } from "vitest";
import { formatOutline, sectionToMarkdown, sectionsToMarkdown } from "./format";
import { createSection } from "./section";

describe("sectionToMarkdown", () => {
  it("should render the heading, a blank line and the content", () => {
    const section = createSection({ header: "Setup", level: 2, content: "Run it." });
    expect(sectionToMarkdown(section)).toBe("## Setup\n\nRun it.");
  });

  it("should join several sections with blank lines", () => {
    const sections = [
      createSection({ header: "Guide", level: 1, content: "Intro" }),
      createSection({ header: "Setup", level: 2, content: "Run it." }),
    ];
    expect(sectionsToMarkdown(sections)).toBe("# Guide\n\nIntro\n\n## Setup\n\nRun it.");
  });
});

describe("formatOutline", () => {
  it("should indent headings by level", () => {
    const sections = [
      createSection({ header: "Guide", level: 1 }),
      createSection({ header: "Install", level: 2 }),
      createSection({ header: "Linux", level: 3 }),
      createSection({ header: "Usage", level: 2 }),
    ];

    expect(formatOutline(sections)).toBe("- Guide\n  - Install\n    - Linux\n  - Usage");
  });

  it("should return an empty string for no sections", () => {
    expect(formatOutline([])).toBe("");
  });
});
