import { z } from "zod";
import { createSection } from "./section";
import type { MarkdownSection } from "./types";

/**
 * Wire shape of a header/content pair, as returned to MCP clients
 */
export const MarkdownContentRecordSchema = z.object({
  section_header: z.string().describe("The Markdown section header"),
  section_text: z.string().describe("The Markdown section content"),
});

export const SectionMetadataRecordSchema = z.object({
  token_count: z.number().int().nonnegative().optional(),
  model_version: z.string().optional(),
  normalized: z.boolean().default(false),
  error: z.string().optional(),
  original_content: MarkdownContentRecordSchema.optional(),
  parents: z.record(z.string()).default({}),
  siblings: z.array(z.string()).default([]),
});

/**
 * Wire shape of a section. Field names follow the snake_case convention of
 * the split_text tool's JSON output.
 */
export const SectionRecordSchema = MarkdownContentRecordSchema.extend({
  header_level: z.number().int().positive().describe("The level of the header (number of #)"),
  metadata: SectionMetadataRecordSchema.default({}),
});

export type SectionRecord = z.output<typeof SectionRecordSchema>;

/**
 * Converts a section into its wire record.
 */
export function toSectionRecord(section: MarkdownSection): SectionRecord {
  const { metadata } = section;
  return {
    section_header: section.header,
    section_text: section.content,
    header_level: section.level,
    metadata: {
      token_count: metadata.tokenCount,
      model_version: metadata.modelVersion,
      normalized: metadata.normalized,
      error: metadata.error,
      original_content: metadata.originalContent && {
        section_header: metadata.originalContent.header,
        section_text: metadata.originalContent.content,
      },
      parents: { ...metadata.parents },
      siblings: [...metadata.siblings],
    },
  };
}

/**
 * Validates an untrusted wire record and converts it back into a section.
 * The header is normalized, so records carrying `#` markers are accepted.
 * @throws {z.ZodError} If the record does not match {@link SectionRecordSchema}
 */
export function fromSectionRecord(record: unknown): MarkdownSection {
  const parsed = SectionRecordSchema.parse(record);
  const { metadata } = parsed;

  return createSection({
    header: parsed.section_header,
    level: parsed.header_level,
    content: parsed.section_text,
    metadata: {
      tokenCount: metadata.token_count,
      modelVersion: metadata.model_version,
      normalized: metadata.normalized,
      error: metadata.error,
      originalContent: metadata.original_content && {
        header: metadata.original_content.section_header,
        content: metadata.original_content.section_text,
      },
      parents: metadata.parents,
      siblings: metadata.siblings,
    },
  });
}
