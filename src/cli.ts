#!/usr/bin/env tsx

import { Command } from "commander";
import type { HeadingModel } from "./heading-score.ts";
import { loadOutlineConfig, resolveHeadingModel } from "./outline-config.ts";
import { convertPdfDirectory, convertPdfToOutline } from "./outline-document.ts";
import { formatHeadingPreview, formatLevelDistribution } from "./outline-summary.ts";
import type { Heading, ScoredHeading } from "./outline-types.ts";

interface OutlineCommandOptions {
  profile?: string;
  config?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name("pdf-outline")
  .description("Detect the title and H1/H2/H3 heading outline of PDF documents")
  .showHelpAfterError();

program.action(() => {
  program.outputHelp();
});

program
  .command("outline")
  .description("Write the heading outline of one PDF as JSON")
  .argument("<pdfPath>", "Path to input PDF file")
  .argument("<outputJsonPath>", "Path to output JSON file")
  .option("-p, --profile <name>", "Pattern profile: default or section (overrides --config)")
  .option("-c, --config <path>", "JSON file overriding patterns and weights")
  .option("-v, --verbose", "Print every accepted heading with its score")
  .action(async (pdfPath: string, outputJsonPath: string, options: OutlineCommandOptions) => {
    const model = await resolveCommandModel(options);
    const conversion = await convertPdfToOutline({
      inputPdfPath: pdfPath,
      outputJsonPath,
      model,
      onHeadingAccepted: options.verbose ? logAcceptedHeading : undefined,
    });

    console.log(`Extracted ${conversion.headings.length} heading(s) to ${conversion.outputJsonPath}`);
    logHeadingSummary(conversion.headings);
  });

program
  .command("batch")
  .description("Write a JSON outline for every PDF in a directory")
  .argument("[inputDir]", "Directory containing PDF files", process.env.INPUT_DIR ?? "input")
  .argument("[outputDir]", "Directory for JSON outlines", process.env.OUTPUT_DIR ?? "output")
  .option("-p, --profile <name>", "Pattern profile: default or section (overrides --config)")
  .option("-c, --config <path>", "JSON file overriding patterns and weights")
  .action(async (inputDir: string, outputDir: string, options: OutlineCommandOptions) => {
    const model = await resolveCommandModel(options);
    const result = await convertPdfDirectory({
      inputDirPath: inputDir,
      outputDirPath: outputDir,
      model,
    });

    for (const conversion of result.converted) {
      console.log(`${conversion.outputJsonPath}: ${conversion.headings.length} heading(s)`);
      logHeadingSummary(conversion.headings, "  ");
    }
    console.log(`Converted ${result.converted.length} PDF file(s), ${result.failed.length} failed`);
    if (result.failed.length > 0) process.exitCode = 1;
  });

async function resolveCommandModel(options: OutlineCommandOptions): Promise<HeadingModel> {
  if (!options.config) return resolveHeadingModel(options.profile);
  return loadOutlineConfig(options.config, options.profile);
}

function logAcceptedHeading(heading: ScoredHeading): void {
  console.log(
    `  ${heading.level}: "${heading.text}" (page ${heading.page}, score ${heading.score.toFixed(2)})`,
  );
}

function logHeadingSummary(headings: Heading[], indent = ""): void {
  const distribution = formatLevelDistribution(headings);
  if (distribution === undefined) {
    console.log(`${indent}No headings detected`);
    return;
  }
  console.log(`${indent}${distribution}`);
  for (const line of formatHeadingPreview(headings)) console.log(`${indent}  ${line}`);
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
