import { constants } from "node:fs";
import { access, readdir } from "node:fs/promises";
import { join } from "node:path";

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new Error(`Cannot read input PDF: ${filePath}`);
  }
}

export async function listPdfFiles(dirPath: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await readdir(dirPath);
  } catch {
    throw new Error(`Input directory not found: ${dirPath}`);
  }
  return entries
    .filter((entry) => entry.toLowerCase().endsWith(".pdf"))
    .sort((left, right) => left.localeCompare(right))
    .map((entry) => join(dirPath, entry));
}
