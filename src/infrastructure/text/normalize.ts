/**
 * Collapses runs of blank lines into a single empty line.
 *
 * - a line holding only whitespace counts as blank and is emitted empty
 * - blank lines before the first non-blank line are dropped
 * - non-blank lines pass through untouched
 */
export function squeezeBlankLines(input: string): string {
  const result: string[] = [];
  let prevBlank = false;
  let seenContent = false;

  for (const line of input.split("\n")) {
    if (line.trim()) {
      result.push(line);
      prevBlank = false;
      seenContent = true;
    } else if (seenContent && !prevBlank) {
      result.push("");
      prevBlank = true;
    }
  }

  return result.join("\n");
}

/** Universal newlines: `\r\n` and lone `\r` become `\n`. */
export function normalizeNewlines(input: string): string {
  return input.replace(/\r\n?/g, "\n");
}
