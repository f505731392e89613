import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { fromSectionRecord, toSectionRecord } from "./schema";
import { createSection } from "./section";

describe("toSectionRecord", () => {
  it("should use the wire field names", () => {
    const section = createSection({
      header: "Install",
      level: 2,
      content: "Run the installer.",
      metadata: { parents: { h1: "Guide" }, siblings: ["Usage"] },
    });

    // JSON drops the optional fields that are unset
    expect(JSON.parse(JSON.stringify(toSectionRecord(section)))).toEqual({
      section_header: "Install",
      section_text: "Run the installer.",
      header_level: 2,
      metadata: {
        normalized: false,
        parents: { h1: "Guide" },
        siblings: ["Usage"],
      },
    });
  });

  it("should map the annotation fields", () => {
    const section = createSection({
      header: "Install",
      level: 2,
      content: "Run the installer.",
      metadata: {
        tokenCount: 4,
        modelVersion: "test-model",
        normalized: true,
        originalContent: { header: "install", content: "run the installer" },
      },
    });

    expect(toSectionRecord(section).metadata).toEqual({
      token_count: 4,
      model_version: "test-model",
      normalized: true,
      original_content: { section_header: "install", section_text: "run the installer" },
      parents: {},
      siblings: [],
    });
  });
});

describe("fromSectionRecord", () => {
  it("should fill in missing metadata and normalize the header", () => {
    const section = fromSectionRecord({
      section_header: "## Setup",
      section_text: "Steps.",
      header_level: 2,
    });

    expect(section).toEqual({
      header: "Setup",
      level: 2,
      content: "Steps.",
      metadata: { normalized: false, parents: {}, siblings: [] },
    });
  });

  it("should read back a serialized section", () => {
    const original = createSection({
      header: "Install",
      level: 3,
      content: "Body",
      metadata: {
        parents: { h1: "Guide", h2: "Setup" },
        siblings: ["Configure"],
        error: "normalization failed",
      },
    });

    const record = JSON.parse(JSON.stringify(toSectionRecord(original)));
    expect(fromSectionRecord(record)).toEqual(original);
  });

  it("should reject records with an invalid level", () => {
    expect(() =>
      fromSectionRecord({ section_header: "Bad", section_text: "", header_level: 0 }),
    ).toThrow(ZodError);
  });

  it("should reject records with missing fields", () => {
    expect(() => fromSectionRecord({ section_header: "Bad" })).toThrow(ZodError);
  });
});
