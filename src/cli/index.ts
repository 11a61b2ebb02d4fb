#!/usr/bin/env node
import { Command, CommanderError } from "commander";
import { registerStripCommand } from "./commands/strip";
import { ExitCode } from "./exit-codes";

const program = new Command();

const version = process.env.npm_package_version ?? "1.0.0";
program
  .name("strip-tags")
  .description("Strip HTML tags from a file or stdin.")
  .version(`strip-tags ${version}`, "-v, --version", "Print version and exit");

registerStripCommand(program);

// parse errors throw instead of exiting so they can map to the usage exit code
program.exitOverride();

process.on("SIGINT", () => {
  process.stderr.write("\nOperation cancelled\n");
  process.exit(ExitCode.interrupted);
});

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    // commander has already printed help, the version or the error message
    process.exit(error.exitCode === 0 ? ExitCode.success : ExitCode.usage);
  }
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(ExitCode.failure);
});
