import type { AllowSet } from "../../domain/filter/allow-set";
import { stripTags } from "../../infrastructure/text/html";
import { squeezeBlankLines } from "../../infrastructure/text/normalize";

export type FilterOptions = {
  /** Collapse runs of blank lines into one. Defaults to true. */
  squeeze?: boolean;
  stripComments?: boolean;
};

/**
 * Strips every tag not in `allowedTags` and, unless disabled, squeezes blank lines.
 * Never throws: malformed markup is repaired on a best-effort basis.
 */
export function filterHtml(rawHtml: string, allowedTags: AllowSet, options: FilterOptions = {}): string {
  const stripped = stripTags(rawHtml, allowedTags, { stripComments: options.stripComments });
  return options.squeeze === false ? stripped : squeezeBlankLines(stripped);
}
