/**
 * Header text and body of a Markdown section, without hierarchy information
 */
export interface MarkdownContent {
  header: string;
  content: string;
}

/**
 * Ancestor headings of a section keyed by level label ("h1", "h2", ...),
 * ordered from the outermost level inwards
 */
export type ParentHeadings = Record<string, string>;

/**
 * Relationship data and downstream annotations attached to a section
 */
export interface SectionMetadata {
  /** Token count reported by whatever post-processed the section */
  tokenCount?: number;
  /** Model that post-processed the section */
  modelVersion?: string;
  /** Whether the content was rewritten by a normalization step */
  normalized: boolean;
  /** Failure reported by a normalization step */
  error?: string;
  /** Section as it was before normalization */
  originalContent?: MarkdownContent;
  parents: ParentHeadings;
  /** Headers of the other sections at the same level under the same parents */
  siblings: string[];
}

/**
 * A heading of a Markdown document together with the text it introduces
 */
export interface MarkdownSection extends MarkdownContent {
  /** Number of `#` characters in the heading (1 = top level) */
  level: number;
  metadata: SectionMetadata;
}

/**
 * Interface for a splitter that turns a markdown document into sections
 */
export interface DocumentSplitter {
  splitText(markdown: string): MarkdownSection[];
}
