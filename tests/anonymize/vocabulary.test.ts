import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadVocabulary } from "../../src/anonymize/vocabulary.js";

describe("loadVocabulary", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "vocabulary-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the bundled word list", async () => {
    const words = await loadVocabulary();
    expect(words).toContain("openshift");
    expect(words).toContain("api");
  });

  it("loads a custom file", async () => {
    const file = join(dir, "words.json");
    await writeFile(file, JSON.stringify({ words: ["alpha", "beta"] }));
    expect(await loadVocabulary(file)).toEqual(["alpha", "beta"]);
  });

  it("rejects a file without a word list", async () => {
    const file = join(dir, "bad.json");
    await writeFile(file, JSON.stringify({ terms: [] }));
    await expect(loadVocabulary(file)).rejects.toThrow(`invalid vocabulary file ${file}`);
  });
});
