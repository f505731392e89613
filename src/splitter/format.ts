import type { MarkdownSection } from "./types";

/**
 * Renders a section back to Markdown: the heading, a blank line, then the content.
 */
export function sectionToMarkdown(section: MarkdownSection): string {
  return `${"#".repeat(section.level)} ${section.header}\n\n${section.content}`;
}

export function sectionsToMarkdown(sections: MarkdownSection[]): string {
  return sections.map(sectionToMarkdown).join("\n\n");
}

/**
 * Renders the headings as a nested bullet list, indented two spaces per level.
 */
export function formatOutline(sections: MarkdownSection[]): string {
  return sections
    .map((section) => `${"  ".repeat(section.level - 1)}- ${section.header}`)
    .join("\n");
}
