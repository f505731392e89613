import { logger } from "../utils/logger";
import { SplitterError } from "./errors";
import { createSection } from "./section";
import type { DocumentSplitter, MarkdownSection, ParentHeadings } from "./types";

/**
 * A fenced code block that has been opened but not closed yet
 */
interface OpenFence {
  marker: "`" | "~";
  length: number;
}

/**
 * A heading whose content lines are still being collected
 */
interface OpenSection {
  headingLine: string;
  level: number;
  lines: string[];
}

// Lines only break on \n, so `s` keeps U+2028/U+2029 inside the line.
// ATX heading: `#` run at the very start of the line, then whitespace or end of line.
const HEADING_REGEX = /^(#+)(?:[ \t].*)?$/s;
// Up to three spaces of indentation, a run of 3+ backticks or tildes, optional info string.
const FENCE_OPEN_REGEX = /^ {0,3}(`{3,}|~{3,})(.*)$/s;
const FENCE_CLOSE_REGEX = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;

/**
 * Splits markdown documents into sections keyed by their ATX headings and
 * records how the sections relate to each other.
 *
 * The splitting process happens in two passes:
 * 1. Classify lines and cut the document into (header, level, content) sections.
 *    Lines inside fenced code blocks are never read as headings.
 * 2. Walk the finished list to assign each section its parent headings, then
 *    group sections by (level, parents) to assign their siblings.
 *
 * Instances hold no state between calls and can be shared freely.
 */
export class MarkdownSectionSplitter implements DocumentSplitter {
  /**
   * Main entry point for splitting markdown content.
   * Returns an empty list when the document has no headings.
   * @throws {SplitterError} If either pass fails unexpectedly
   */
  splitText(markdown: string): MarkdownSection[] {
    try {
      const sections = this.assignRelationships(this.extractSections(markdown));
      logger.debug(
        `Split ${markdown.length} characters of Markdown into ${sections.length} sections`,
      );
      return sections;
    } catch (error) {
      if (error instanceof SplitterError) {
        throw error;
      }
      throw new SplitterError(
        `Unexpected error while splitting Markdown: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  /**
   * Pass 1: cut the document into sections at every heading line outside a
   * fenced code block. Text before the first heading belongs to no section.
   * An unterminated fence swallows the rest of the document as content.
   */
  extractSections(markdown: string): MarkdownSection[] {
    const sections: MarkdownSection[] = [];
    let current: OpenSection | undefined;
    let fence: OpenFence | undefined;

    // A leading byte order mark would hide a heading on the first line
    const text = markdown.startsWith("\uFEFF") ? markdown.slice(1) : markdown;

    for (const line of text.split(/\r?\n/)) {
      if (fence) {
        if (this.closesFence(line, fence)) {
          fence = undefined;
        }
        current?.lines.push(line);
        continue;
      }

      const opening = this.matchFenceOpening(line);
      if (opening) {
        fence = opening;
        current?.lines.push(line);
        continue;
      }

      const heading = HEADING_REGEX.exec(line);
      if (heading) {
        if (current) {
          sections.push(this.closeSection(current));
        }
        current = { headingLine: line, level: heading[1].length, lines: [] };
        continue;
      }

      current?.lines.push(line);
    }

    if (current) {
      sections.push(this.closeSection(current));
    }

    return sections;
  }

  /**
   * Pass 2: assign parent headings in document order, then siblings per
   * (level, parents) group. Returns new section objects; the input is left as is.
   */
  assignRelationships(sections: MarkdownSection[]): MarkdownSection[] {
    // Index i holds the header most recently seen at level i + 1 that is still open.
    const openHeadings: string[] = [];

    const withParents = sections.map((section): MarkdownSection => {
      openHeadings.length = section.level - 1;

      const parents: ParentHeadings = {};
      openHeadings.forEach((header, index) => {
        parents[`h${index + 1}`] = header;
      });
      openHeadings[section.level - 1] = section.header;

      return {
        ...section,
        metadata: { ...section.metadata, parents, siblings: [] },
      };
    });

    const groups = new Map<string, number[]>();
    withParents.forEach((section, index) => {
      const key = JSON.stringify([section.level, Object.entries(section.metadata.parents)]);
      const members = groups.get(key);
      if (members) {
        members.push(index);
      } else {
        groups.set(key, [index]);
      }
    });

    for (const members of groups.values()) {
      for (const index of members) {
        const siblings = new Set<string>();
        for (const other of members) {
          if (other !== index) {
            siblings.add(withParents[other].header);
          }
        }
        withParents[index].metadata.siblings = [...siblings];
      }
    }

    return withParents;
  }

  private closeSection(open: OpenSection): MarkdownSection {
    const { lines } = open;
    let start = 0;
    let end = lines.length;
    while (start < end && lines[start].trim() === "") start++;
    while (end > start && lines[end - 1].trim() === "") end--;

    return createSection({
      header: open.headingLine,
      level: open.level,
      content: lines.slice(start, end).join("\n"),
    });
  }

  private matchFenceOpening(line: string): OpenFence | undefined {
    const match = FENCE_OPEN_REGEX.exec(line);
    if (!match) {
      return undefined;
    }
    const [, run, info] = match;
    // A backtick fence cannot carry backticks in its info string (that is inline code).
    if (run[0] === "`" && info.includes("`")) {
      return undefined;
    }
    return { marker: run[0] === "`" ? "`" : "~", length: run.length };
  }

  private closesFence(line: string, fence: OpenFence): boolean {
    const match = FENCE_CLOSE_REGEX.exec(line);
    if (!match) {
      return false;
    }
    const [, run] = match;
    return run[0] === fence.marker && run.length >= fence.length;
  }
}
