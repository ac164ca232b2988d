import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { defaultPlatformId, loadConfig } from "./config.ts";
import { makeTempDir } from "./testing.ts";

describe("loadConfig", () => {
  let tmp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    tmp.remove();
  });

  it("returns defaults when the file is missing", () => {
    expect(loadConfig(join(tmp.path, "benchmark.config.json"))).toEqual({ versions: [] });
  });

  it("reads a valid file", () => {
    const path = join(tmp.path, "benchmark.config.json");
    writeFileSync(
      path,
      JSON.stringify({
        versions: ["5.2.4", "6.0.4"],
        workingCopy: "../app",
        refTemplate: "v{version}",
        format: "html",
        harness: { command: "make bench OUT={output}" },
      }),
    );

    expect(loadConfig(path)).toEqual({
      versions: ["5.2.4", "6.0.4"],
      workingCopy: "../app",
      refTemplate: "v{version}",
      format: "html",
      harness: { command: "make bench OUT={output}" },
    });
  });

  it("rejects invalid JSON", () => {
    const path = join(tmp.path, "bad.json");
    writeFileSync(path, "{");
    expect(() => loadConfig(path)).toThrow(`Failed to read ${path}`);
  });

  it("lists schema problems", () => {
    const path = join(tmp.path, "bad.json");
    writeFileSync(path, JSON.stringify({ format: "docx", refTemplate: "v1" }));

    expect(() => loadConfig(path)).toThrow(/^Invalid .*bad\.json:\n {2}refTemplate: .*\n {2}format: /);
  });
});

describe("defaultPlatformId", () => {
  it("names the OS, architecture and Node.js major", () => {
    const major = process.versions.node.split(".")[0];
    expect(defaultPlatformId()).toMatch(new RegExp(`^\\w+-${process.arch}-node${major}$`));
  });
});
