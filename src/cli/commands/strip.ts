import { z } from "zod";
import type { Command } from "commander";
import { loadConfig } from "../../infrastructure/config/load";
import { readInput } from "../../infrastructure/loaders/input-reader";
import { filterHtml } from "../../application/filter/tag-filter";
import { parseAllowList } from "../../domain/filter/allow-set";
import { toAppError } from "../../domain/common/errors";
import { createLogger } from "../logging";
import { ExitCode } from "../exit-codes";

const StripArgsSchema = z.object({
  filename: z.string().min(1).optional(),
  allow: z.string().optional(),
  squeeze: z.boolean().optional(),
  stripComments: z.boolean().optional(),
  config: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
  debug: z.boolean().optional(),
});

export type StripArgs = z.infer<typeof StripArgsSchema>;

export type StripIo = {
  stdin: AsyncIterable<Buffer | string>;
  stdout: (chunk: string) => void;
  stderr: (line: string) => void;
};

const EXAMPLES = `
Examples:
  # Read from a file and allow <a>, <p>, and <div> tags
  strip-tags input.html --allow a,p,div

  # Read from stdin and allow <a> and <p> tags
  cat input.html | strip-tags -a a,p

  # Read from a file and strip all tags
  strip-tags input.html

  # Read from a file, strip all tags, and disable squeezing
  strip-tags input.html --no-squeeze
`;

export function registerStripCommand(program: Command): void {
  program
    .argument("[filename]", "Input HTML file (reads stdin when omitted)")
    .allowExcessArguments(false)
    .option("-a, --allow <tags>", "Comma-separated list of allowed tags")
    .option("--no-squeeze", "Disable squeezing of repeated empty lines")
    .option("--strip-comments", "Remove HTML comments as well")
    .option("--config <path>", "Path to YAML/JSON config file")
    .option("--verbose", "Verbose logs")
    .option("--debug", "Debug logs (includes stack traces)")
    .addHelpText("after", EXAMPLES)
    .action(async (filename: string | undefined, opts: Record<string, unknown>, command: Command) => {
      const parsed = StripArgsSchema.safeParse({
        ...opts,
        filename,
        // --no-squeeze defaults squeeze to true; only an explicit flag may override config
        squeeze: command.getOptionValueSource("squeeze") === "cli" ? opts.squeeze : undefined,
      });
      if (!parsed.success) {
        console.error(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n"));
        process.exit(ExitCode.usage);
      }
      process.exit(await runStrip(parsed.data));
    });
}

export function defaultIo(): StripIo {
  return {
    stdin: process.stdin,
    stdout: (chunk) => process.stdout.write(chunk),
    stderr: (line) => process.stderr.write(`${line}\n`),
  };
}

/**
 * Reads the input, filters it and prints the result followed by a newline.
 * Returns the exit code instead of exiting so it can be driven in-process.
 */
export async function runStrip(args: StripArgs, io: StripIo = defaultIo()): Promise<ExitCode> {
  const logLevel = args.debug ? "debug" : args.verbose ? "info" : undefined;

  try {
    const config = await loadConfig({
      configPath: args.config,
      overrides: {
        logLevel,
        allow: args.allow,
        squeeze: args.squeeze,
        stripComments: args.stripComments,
      },
    });
    const logger = createLogger(config, io.stderr);

    const allowed = parseAllowList(config.allow);
    logger.debug(`allow=[${[...allowed].join(",")}] squeeze=${config.squeeze} stripComments=${config.stripComments}`);

    const input = await readInput(args.filename, io.stdin);
    logger.info(`Read ${input.text.length} chars from ${input.source}`);

    const text = filterHtml(input.text, allowed, {
      squeeze: config.squeeze,
      stripComments: config.stripComments,
    });
    io.stdout(`${text}\n`);
    return ExitCode.success;
  } catch (error) {
    const appError = toAppError(error);
    io.stderr(args.debug ? (appError.stack ?? appError.message) : `Error: ${appError.message}`);
    return ExitCode.failure;
  }
}
