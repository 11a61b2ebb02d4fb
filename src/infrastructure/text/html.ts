import { Parser } from "htmlparser2";
import { isAllowed, type AllowSet } from "../../domain/filter/allow-set";

export type StripTagsOptions = {
  /** Drop `<!-- ... -->` comments as well. Comments are kept by default. */
  stripComments?: boolean;
};

/**
 * Elements that never have an end tag. The parser reports an implied close
 * for them, which must not be serialized.
 */
const VOID_TAGS = new Set([
  "area",
  "base",
  "basefont",
  "br",
  "col",
  "command",
  "embed",
  "frame",
  "hr",
  "image",
  "img",
  "input",
  "isindex",
  "keygen",
  "link",
  "meta",
  "param",
  "source",
  "track",
  "wbr",
]);

/** Elements whose body the parser hands over as raw text. */
const RAW_TEXT_TAGS = new Set(["script", "style"]);

/**
 * Removes every tag whose name is not in `allow`, keeping its content in place.
 *
 * Uses htmlparser2, which tolerates unclosed tags and stray angle brackets.
 * Allowed tags are copied from the source slice the parser reports, so their
 * attributes, quoting and case survive untouched. Tags the parser only implies
 * (an unclosed `<p>`, a stray `</p>`) are written out in canonical form, the
 * way a repaired tree would serialize.
 *
 * Text is never entity-decoded, and its `<` and `>` are escaped so that text
 * joined across a removed tag cannot turn into markup. Bodies of allowed
 * `<script>`/`<style>` elements are copied as-is. Input the parser leaves
 * unconsumed at the end (`if x<y`) is kept as text.
 */
export function stripTags(html: string, allow: AllowSet, options: StripTagsOptions = {}): string {
  if (!html) return "";

  const out: string[] = [];
  // implied end tags emitted once input runs out; trailing text goes before them
  const closing: string[] = [];
  let ending = false;
  let consumed = 0;
  let rawTextDepth = 0;
  // allowed elements whose start tag has been written, by name
  const opened = new Map<string, number>();

  const advance = (end: number) => {
    if (end > consumed) consumed = end;
  };
  const text = (data: string) => (rawTextDepth > 0 ? data : escapeText(data));

  // Start tags, comments and declarations end at the parser's endIndex.
  const source = () => {
    advance(parser.endIndex + 1);
    return html.slice(html.indexOf("<", parser.startIndex), parser.endIndex + 1);
  };
  // End tags may carry junk before their ">" (`</p >`), which the parser skips.
  const endTagSource = () => {
    const found = html.indexOf(">", parser.endIndex);
    const end = found === -1 ? html.length : found + 1;
    advance(end);
    return html.slice(html.indexOf("<", parser.startIndex), end);
  };

  const parser = new Parser(
    {
      onopentag(name, _attribs, isImplied) {
        const markup = isImplied ? `<${name}>` : source();
        if (!isAllowed(allow, name)) return;
        if (RAW_TEXT_TAGS.has(name)) rawTextDepth++;
        if (!VOID_TAGS.has(name)) opened.set(name, (opened.get(name) ?? 0) + 1);
        out.push(markup);
      },
      onclosetag(name, isImplied) {
        const markup = isImplied ? `</${name}>` : endTagSource();
        if (!isAllowed(allow, name) || VOID_TAGS.has(name)) return;
        const depth = opened.get(name) ?? 0;
        // a tag cut off at the end of input is on the parser's stack but was never written
        if (isImplied && depth === 0) return;
        opened.set(name, Math.max(depth - 1, 0));
        if (ending && isImplied) {
          closing.push(markup);
          return;
        }
        if (RAW_TEXT_TAGS.has(name) && rawTextDepth > 0) rawTextDepth--;
        out.push(markup);
      },
      ontext(data) {
        advance(parser.endIndex + 1);
        out.push(text(data));
      },
      oncomment() {
        const markup = source();
        if (options.stripComments) return;
        out.push(markup);
      },
      onprocessinginstruction(name) {
        const markup = source();
        if (name.toLowerCase() === "!doctype") return;
        out.push(markup);
      },
    },
    { decodeEntities: false },
  );

  parser.write(html);
  ending = true;
  parser.end();

  if (consumed < html.length) out.push(text(html.slice(consumed)));
  out.push(...closing);

  return out.join("");
}

function escapeText(data: string): string {
  return data.replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
