import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { copyFileBuffered } from "../copy_file_sync.ts";

describe("examples/copy_file_sync", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "buffered-io-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("copies a file with one write per full buffer", () => {
    const content = new Uint8Array(10_000);
    for (let i = 0; i < content.length; i++) {
      content[i] = (i * 7) % 256;
    }
    const from = join(dir, "from.bin");
    const to = join(dir, "to.bin");
    writeFileSync(from, content);

    const writes = copyFileBuffered(from, to, 100, 4096);

    expect(new Uint8Array(readFileSync(to))).toEqual(content);
    // 4096 + 4096 + 1808
    expect(writes).toBe(3);
  });

  it("copies an empty file", () => {
    const from = join(dir, "empty.bin");
    const to = join(dir, "copy.bin");
    writeFileSync(from, new Uint8Array());

    expect(copyFileBuffered(from, to)).toBe(0);
    expect(readFileSync(to).length).toBe(0);
  });
});
