import type { DocumentSplitter, MarkdownSection } from "../splitter";
import { logger } from "../utils/logger";
import { ToolError } from "./errors";

export interface SplitTextToolOptions {
  /**
   * The Markdown document to split. Headings are lines starting with `#`
   * (e.g. "# Header 1", "## Header 2").
   */
  text: string;
}

export interface SplitTextResult {
  /** Sections in document order; empty when the document has no headings. */
  sections: MarkdownSection[];
}

/**
 * Tool for splitting a Markdown document into hierarchical sections with
 * their parent and sibling headings.
 */
export class SplitTextTool {
  private readonly splitter: DocumentSplitter;

  constructor(splitter: DocumentSplitter) {
    this.splitter = splitter;
  }

  /**
   * @throws {ToolError} If the splitter fails. An empty document is not a failure.
   */
  async execute(options: SplitTextToolOptions): Promise<SplitTextResult> {
    const { text } = options;
    logger.info(`✂️ Splitting ${text.length} characters of Markdown...`);

    try {
      const sections = this.splitter.splitText(text);
      logger.info(`✅ Split text into ${sections.length} sections`);
      return { sections };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`❌ Error splitting text: ${message}`);
      throw new ToolError(message, this.constructor.name);
    }
  }
}
