import { mkdir, writeFile } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { assertReadableFile, listPdfFiles } from "./file-access.ts";
import type { HeadingModel } from "./heading-score.ts";
import { extractOutline } from "./outline-extract.ts";
import type { ExtractOutlineOptions } from "./outline-extract.ts";
import type { DocumentOutline, Heading, TextRun } from "./outline-types.ts";
import { extractDocument } from "./pdf-extract.ts";
import { collectTextRuns } from "./text-runs.ts";

export interface ConvertPdfToOutlineInput extends ExtractOutlineOptions {
  inputPdfPath: string;
  outputJsonPath: string;
}

export interface ConvertPdfToOutlineResult {
  outputJsonPath: string;
  headings: Heading[];
}

export interface ConvertPdfDirectoryInput {
  inputDirPath: string;
  outputDirPath: string;
  model?: HeadingModel;
}

export interface ConvertPdfDirectoryResult {
  converted: ConvertPdfToOutlineResult[];
  failed: Array<{ inputPdfPath: string; message: string }>;
}

export function buildDocumentOutline(
  title: string,
  runs: readonly TextRun[],
  options: ExtractOutlineOptions = {},
): DocumentOutline {
  return { title, outline: extractOutline(runs, options) };
}

export function renderOutlineJson(outline: DocumentOutline): string {
  return `${JSON.stringify(outline, null, 2)}\n`;
}

export async function convertPdfToOutline(
  input: ConvertPdfToOutlineInput,
): Promise<ConvertPdfToOutlineResult> {
  const resolvedInputPdfPath = resolve(input.inputPdfPath);
  const resolvedOutputJsonPath = resolve(input.outputJsonPath);

  await assertReadableFile(resolvedInputPdfPath);

  const runs = collectTextRuns(await extractDocument(resolvedInputPdfPath));
  const outline = buildDocumentOutline(documentTitle(resolvedInputPdfPath), runs, {
    model: input.model,
    onHeadingAccepted: input.onHeadingAccepted,
  });

  await mkdir(dirname(resolvedOutputJsonPath), { recursive: true });
  await writeFile(resolvedOutputJsonPath, renderOutlineJson(outline), "utf8");

  return { outputJsonPath: resolvedOutputJsonPath, headings: outline.outline };
}

export async function convertPdfDirectory(
  input: ConvertPdfDirectoryInput,
): Promise<ConvertPdfDirectoryResult> {
  const inputPdfPaths = await listPdfFiles(resolve(input.inputDirPath));
  const result: ConvertPdfDirectoryResult = { converted: [], failed: [] };

  for (const inputPdfPath of inputPdfPaths) {
    const outputJsonPath = join(input.outputDirPath, `${documentTitle(inputPdfPath)}.json`);
    try {
      result.converted.push(
        await convertPdfToOutline({ inputPdfPath, outputJsonPath, model: input.model }),
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      console.error(`Failed to convert ${inputPdfPath}: ${message}`);
      result.failed.push({ inputPdfPath, message });
    }
  }

  return result;
}

function documentTitle(pdfPath: string): string {
  return basename(pdfPath, extname(pdfPath));
}
