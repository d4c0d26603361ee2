import { readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Bundled word list, resolved the same way from src/ and dist/. */
export const DEFAULT_VOCABULARY_FILE = join(__dirname, "..", "..", "data", "allowed-words.json");

const vocabularyFileSchema = z.object({
  words: z.array(z.string().min(1)),
});

export async function loadVocabulary(file: string = DEFAULT_VOCABULARY_FILE): Promise<string[]> {
  const raw = await readFile(file, "utf-8");
  const parsed = vocabularyFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`invalid vocabulary file ${file}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data.words;
}
