import * as fs from "fs/promises";
import { writeFileAtomic } from "../../utils/fs";

export async function saveExtractedStrings(filePath: string, strings: string[]): Promise<void> {
  const sorted = [...new Set(strings)].sort();
  await writeFileAtomic(filePath, sorted.map(str => `${str}\n`).join(""));
}

export async function loadExtractedStrings(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, "utf8");
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
}
