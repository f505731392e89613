export * from "./errors";
export * from "./SplitTextTool";
