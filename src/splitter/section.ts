import { SectionValidationError } from "./errors";
import type { MarkdownSection, SectionMetadata } from "./types";

/**
 * Values a section can be built from. Anything omitted falls back to an empty default.
 */
export interface SectionInput {
  header: string;
  level: number;
  content?: string;
  metadata?: Partial<SectionMetadata>;
}

// A leading run of `#` only counts as a heading marker when whitespace or the end follows.
const HEADING_MARKER_REGEX = /^#+(?=\s|$)/;

/**
 * Strips the `#` marker and the surrounding whitespace from a heading capture.
 * Headers without a marker are returned trimmed, so "#hashtag" stays as is.
 */
export function normalizeHeader(raw: string): string {
  return raw.trim().replace(HEADING_MARKER_REGEX, "").trim();
}

/**
 * Creates section metadata, filling in the defaults for every unset field.
 */
export function createMetadata(partial: Partial<SectionMetadata> = {}): SectionMetadata {
  return {
    ...partial,
    normalized: partial.normalized ?? false,
    parents: { ...partial.parents },
    siblings: [...(partial.siblings ?? [])],
  };
}

/**
 * Builds a section from raw values.
 * @throws {SectionValidationError} If the level is not a positive integer
 */
export function createSection(input: SectionInput): MarkdownSection {
  if (!Number.isInteger(input.level) || input.level < 1) {
    throw new SectionValidationError(
      "level",
      `expected a positive integer but received ${input.level}`,
    );
  }

  return {
    header: normalizeHeader(input.header),
    level: input.level,
    content: input.content ?? "",
    metadata: createMetadata(input.metadata),
  };
}
