#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs/promises";
import { Command } from "commander";
import packageJson from "../package.json";
import { DEFAULT_HTTP_HOST, DEFAULT_HTTP_PORT, DEFAULT_PROTOCOL, loadServerConfig } from "./config";
import { startServer } from "./mcp";
import { MarkdownSectionSplitter, formatOutline, sectionsToMarkdown, toSectionRecord } from "./splitter";
import { SplitTextTool } from "./tools";
import { LogLevel, setLogLevel } from "./utils/logger";

const formatOutput = (data: unknown) => JSON.stringify(data, null, 2);

/**
 * Reads the document from a file, or from stdin when no file is given.
 */
async function readInput(file?: string): Promise<string> {
  if (file) {
    return fs.readFile(file, "utf-8");
  }
  process.stdin.setEncoding("utf-8");
  let text = "";
  for await (const chunk of process.stdin) {
    text += chunk;
  }
  return text;
}

async function main() {
  const tools = {
    splitText: new SplitTextTool(new MarkdownSectionSplitter()),
  };

  const program = new Command();

  program
    .name("markdown-sections")
    .description("Split Markdown documents into hierarchical sections")
    .version(packageJson.version)
    // Add global options for logging level
    .option("--verbose", "Enable verbose (debug) logging", false)
    .option("--silent", "Disable all logging except errors", false);

  program
    .command("split [file]")
    .description("Split a Markdown file (or stdin) and print its sections as JSON")
    .option("-m, --markdown", "Print the sections back as Markdown instead of JSON", false)
    .action(async (file: string | undefined, options: { markdown: boolean }) => {
      const result = await tools.splitText.execute({ text: await readInput(file) });
      if (options.markdown) {
        console.log(sectionsToMarkdown(result.sections));
      } else {
        console.log(formatOutput(result.sections.map(toSectionRecord)));
      }
    });

  program
    .command("outline [file]")
    .description("Print the heading outline of a Markdown file (or stdin)")
    .action(async (file: string | undefined) => {
      const result = await tools.splitText.execute({ text: await readInput(file) });
      console.log(formatOutline(result.sections));
    });

  program
    .command("serve")
    .description("Start the MCP server")
    .option("--protocol <protocol>", `Transport: 'stdio' or 'http' (default: ${DEFAULT_PROTOCOL})`)
    .option("--host <host>", `Host for the http transport (default: ${DEFAULT_HTTP_HOST})`)
    .option("--port <number>", `Port for the http transport (default: ${DEFAULT_HTTP_PORT})`)
    .action(async (options: { protocol?: string; host?: string; port?: string }) => {
      await startServer(loadServerConfig(process.env, options));
    });

  // Hook to set log level after parsing global options but before executing command action
  program.hook("preAction", (thisCommand) => {
    const options = thisCommand.opts();
    if (options.silent) {
      // If silent is true, it overrides verbose
      setLogLevel(LogLevel.ERROR);
    } else if (options.verbose) {
      setLogLevel(LogLevel.DEBUG);
    } else {
      // JSON output goes to stdout; progress messages would mix into it
      setLogLevel(LogLevel.WARN);
    }
  });

  await program.parseAsync();
}

main().catch((error) => {
  console.error("Error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
