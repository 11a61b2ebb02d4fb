import { describe, expect, it } from "vitest";
import { spawnSync } from "node:child_process";
import path from "node:path";

const root = path.resolve(__dirname, "../..");

function runCli(args: string[], input?: string) {
  return spawnSync(process.execPath, ["--import", "tsx", "src/cli/index.ts", ...args], {
    cwd: root,
    encoding: "utf8",
    input,
    env: {
      ...process.env,
      LOG_LEVEL: "",
      STRIP_TAGS_ALLOW: "",
      STRIP_TAGS_SQUEEZE: "",
      STRIP_TAGS_STRIP_COMMENTS: "",
    },
  });
}

describe("cli", () => {
  it("prints help", () => {
    const res = runCli(["--help"]);
    expect(res.status).toBe(0);
    expect(res.stdout).toContain("Usage: strip-tags [options] [filename]");
    expect(res.stdout).toContain("--no-squeeze");
    expect(res.stdout).toContain("strip-tags input.html --allow a,p,div");
  });

  it("prints the version", () => {
    const res = runCli(["--version"]);
    expect(res.status).toBe(0);
    expect(res.stdout).toMatch(/^strip-tags \d+\.\d+\.\d+\n$/);
  });

  it("filters standard input", () => {
    const res = runCli(["-a", "p"], "<p>Hello <b>world</b></p>");
    expect(res.status).toBe(0);
    expect(res.stdout).toBe("<p>Hello world</p>\n");
  });

  it("exits with the usage code for an unknown option", () => {
    const res = runCli(["--bogus"]);
    expect(res.status).toBe(2);
    expect(res.stderr).toContain("error: unknown option '--bogus'");
    expect(res.stdout).toBe("");
  });

  it("exits with the usage code when an option value is missing", () => {
    const res = runCli(["-a"]);
    expect(res.status).toBe(2);
    expect(res.stderr).toContain("error: option '-a, --allow <tags>' argument missing");
  });

  it("exits with the usage code for extra arguments", () => {
    const res = runCli(["a.html", "b.html"]);
    expect(res.status).toBe(2);
    expect(res.stderr).toContain("error: too many arguments");
  });

  it("exits non-zero for a missing file", () => {
    const res = runCli(["does-not-exist.html"]);
    expect(res.status).toBe(1);
    expect(res.stderr).toBe("Error: File 'does-not-exist.html' not found\n");
    expect(res.stdout).toBe("");
  });
});
