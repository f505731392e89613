import { type Mock, beforeEach, describe, expect, it, vi } from "vitest";
import { type DocumentSplitter, SplitterError, createSection } from "../splitter";
import { logger } from "../utils/logger";
import { SplitTextTool } from "./SplitTextTool";
import { ToolError } from "./errors";

vi.mock("../utils/logger");

describe("SplitTextTool", () => {
  let mockSplitter: DocumentSplitter;
  let splitTextTool: SplitTextTool;

  beforeEach(() => {
    vi.resetAllMocks();

    mockSplitter = {
      splitText: vi.fn(),
    };

    splitTextTool = new SplitTextTool(mockSplitter);
  });

  it("should return the sections produced by the splitter", async () => {
    const sections = [createSection({ header: "Intro", level: 1, content: "Hello" })];
    (mockSplitter.splitText as Mock).mockReturnValue(sections);

    const result = await splitTextTool.execute({ text: "# Intro\nHello" });

    expect(mockSplitter.splitText).toHaveBeenCalledWith("# Intro\nHello");
    expect(result).toEqual({ sections });
    expect(logger.info).toHaveBeenCalledWith("✂️ Splitting 13 characters of Markdown...");
    expect(logger.info).toHaveBeenCalledWith("✅ Split text into 1 sections");
  });

  it("should return an empty list rather than fail when there are no sections", async () => {
    (mockSplitter.splitText as Mock).mockReturnValue([]);

    const result = await splitTextTool.execute({ text: "" });

    expect(result).toEqual({ sections: [] });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("should throw ToolError when the splitter fails", async () => {
    (mockSplitter.splitText as Mock).mockImplementation(() => {
      throw new SplitterError("scanner state corrupted");
    });

    const error = await splitTextTool.execute({ text: "# Intro" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolError);
    if (error instanceof ToolError) {
      expect(error.message).toBe("scanner state corrupted");
      expect(error.toolName).toBe("SplitTextTool");
    }
    expect(logger.error).toHaveBeenCalledWith(
      "❌ Error splitting text: scanner state corrupted",
    );
  });
});
