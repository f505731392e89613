export * from "./errors";
export * from "./format";
export * from "./MarkdownSectionSplitter";
export * from "./schema";
export * from "./section";
export * from "./types";
