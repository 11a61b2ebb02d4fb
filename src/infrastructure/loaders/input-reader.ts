import { readFile, stat } from "node:fs/promises";
import { DecodeError, InputError, STDIN_SOURCE } from "../../domain/common/errors";
import { normalizeNewlines } from "../text/normalize";

export type InputSource = {
  /** File name, or "<stdin>" when read from standard input. */
  source: string;
  text: string;
};

/**
 * Reads the whole input from `filename`, or from standard input when omitted,
 * decodes it as strict UTF-8 and converts line endings to `\n`.
 */
export async function readInput(
  filename?: string,
  stdin: AsyncIterable<Buffer | string> = process.stdin,
): Promise<InputSource> {
  if (!filename) {
    const buf = await readStream(stdin);
    return { source: STDIN_SOURCE, text: normalizeNewlines(decodeUtf8(buf, STDIN_SOURCE)) };
  }

  const buf = await readInputFile(filename);
  return { source: filename, text: normalizeNewlines(decodeUtf8(buf, filename)) };
}

async function readInputFile(filename: string): Promise<Buffer> {
  try {
    const info = await stat(filename);
    if (info.isDirectory()) {
      throw new InputError(`Cannot read file '${filename}': is a directory`, undefined, filename);
    }
    return await readFile(filename);
  } catch (error) {
    if (error instanceof InputError) throw error;
    if (errorCode(error) === "ENOENT") {
      throw new InputError(`File '${filename}' not found`, error, filename);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new InputError(`Cannot read file '${filename}': ${reason}`, error, filename);
  }
}

async function readStream(stream: AsyncIterable<Buffer | string>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    }
  } catch (error) {
    throw new InputError("Cannot read standard input", error, STDIN_SOURCE);
  }
  return Buffer.concat(chunks);
}

export function decodeUtf8(buf: Uint8Array, source: string): string {
  try {
    // fatal: reject malformed sequences instead of substituting U+FFFD
    return new TextDecoder("utf-8", { fatal: true }).decode(buf);
  } catch (error) {
    throw new DecodeError(source, error);
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("code" in error)) return undefined;
  return typeof error.code === "string" ? error.code : undefined;
}
