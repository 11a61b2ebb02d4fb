import { describe, expect, it } from "vitest";
import { mkdtemp, writeFile } from "node:fs/promises";
import { Readable } from "node:stream";
import path from "node:path";
import os from "node:os";
import { readInput } from "../../src/infrastructure/loaders/input-reader";
import { DecodeError, InputError } from "../../src/domain/common/errors";

describe("readInput", () => {
  it("reads a UTF-8 file", async () => {
    const dir = await writeTempDir();
    const file = path.join(dir, "page.html");
    await writeFile(file, "<p>héllo</p>", "utf8");

    const input = await readInput(file);
    expect(input).toEqual({ source: file, text: "<p>héllo</p>" });
  });

  it("reads standard input when no file is given", async () => {
    const stdin = Readable.from([Buffer.from("<b>a"), Buffer.from("</b>")]);
    const input = await readInput(undefined, stdin);
    expect(input).toEqual({ source: "<stdin>", text: "<b>a</b>" });
  });

  it("drops a UTF-8 byte order mark", async () => {
    const stdin = Readable.from([Buffer.from([0xef, 0xbb, 0xbf, 0x61])]);
    expect((await readInput(undefined, stdin)).text).toBe("a");
  });

  it("converts CRLF and CR line endings to LF", async () => {
    const dir = await writeTempDir();
    const file = path.join(dir, "crlf.html");
    await writeFile(file, "a\r\n\r\n\r\nb\rc", "utf8");

    expect((await readInput(file)).text).toBe("a\n\n\nb\nc");
  });

  it("reports a missing file as an InputError", async () => {
    const dir = await writeTempDir();
    const file = path.join(dir, "missing.html");

    await expect(readInput(file)).rejects.toBeInstanceOf(InputError);
    await expect(readInput(file)).rejects.toThrow(`File '${file}' not found`);
  });

  it("reports a directory as an InputError", async () => {
    const dir = await writeTempDir();
    await expect(readInput(dir)).rejects.toThrow(`Cannot read file '${dir}': is a directory`);
  });

  it("reports invalid UTF-8 as a DecodeError", async () => {
    const dir = await writeTempDir();
    const file = path.join(dir, "latin1.html");
    await writeFile(file, Buffer.from([0x3c, 0x70, 0x3e, 0xff, 0xfe]));

    const error = await readInput(file).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({
      kind: "decode",
      source: file,
      message: `Cannot decode file '${file}': input is not valid UTF-8`,
    });
  });
});

async function writeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "strip-tags-"));
}
