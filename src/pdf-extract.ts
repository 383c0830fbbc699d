import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type { ExtractedDocument, ExtractedFragment, ExtractedPage } from "./outline-types.ts";

interface PdfTextItem {
  str: string;
  transform: number[];
  height: number;
  fontName: string;
}

interface PdfFontObjects {
  has(objId: string): boolean;
  get(objId: string): unknown;
}

interface PdfFontInfo {
  name: string;
  isBold: boolean;
  isItalic: boolean;
}

const BOLD_FONT_NAME_PATTERN = /bold|black|heavy|semibold|demi/i;
const ITALIC_FONT_NAME_PATTERN = /italic|oblique/i;

export async function extractDocument(inputPdfPath: string): Promise<ExtractedDocument> {
  const data = new Uint8Array(await readFile(inputPdfPath));
  return extractDocumentFromBuffer(data);
}

export async function extractDocumentFromBuffer(data: Uint8Array): Promise<ExtractedDocument> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;
  const pages: ExtractedPage[] = [];

  try {
    for (let i = 0; i < pdf.numPages; i++) {
      const page = await pdf.getPage(i + 1);
      const viewport = page.getViewport({ scale: 1 });
      const textContent = await page.getTextContent();
      // Font objects only land in commonObjs once the operator list is built.
      await page.getOperatorList();
      pages.push({
        pageNumber: i + 1,
        width: viewport.width,
        height: viewport.height,
        fragments: collectPageFragments(textContent.items, (fontName) =>
          resolveFontInfo(page.commonObjs, fontName, textContent.styles),
        ),
      });
    }
    return { pages };
  } finally {
    await pdf.destroy();
  }
}

function collectPageFragments(
  items: unknown[],
  fontInfo: (fontName: string) => PdfFontInfo,
): ExtractedFragment[] {
  const fragments: ExtractedFragment[] = [];
  const fontCache = new Map<string, PdfFontInfo>();

  for (const item of items) {
    if (!isPdfTextItem(item)) continue;
    let font = fontCache.get(item.fontName);
    if (!font) {
      font = fontInfo(item.fontName);
      fontCache.set(item.fontName, font);
    }
    const fragment = toExtractedFragment(item, font);
    if (fragment) fragments.push(fragment);
  }

  return fragments;
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    "height" in item &&
    typeof item.height === "number" &&
    "fontName" in item &&
    typeof item.fontName === "string"
  );
}

function resolveFontInfo(
  fontObjects: PdfFontObjects,
  fontName: string,
  styles: Record<string, unknown>,
): PdfFontInfo {
  const loaded = fontObjects.has(fontName) ? toPdfFontInfo(fontObjects.get(fontName)) : undefined;
  if (loaded) return loaded;
  const style = styles[fontName];
  if (
    typeof style === "object" &&
    style !== null &&
    "fontFamily" in style &&
    typeof style.fontFamily === "string"
  ) {
    return fontInfoFromName(style.fontFamily);
  }
  return fontInfoFromName(fontName);
}

function toPdfFontInfo(font: unknown): PdfFontInfo | undefined {
  if (typeof font !== "object" || font === null) return undefined;
  if (!("name" in font) || typeof font.name !== "string") return undefined;
  const fromName = fontInfoFromName(font.name);
  return {
    name: fromName.name,
    isBold: fromName.isBold || hasFontFlag(font, "bold") || hasFontFlag(font, "black"),
    isItalic: fromName.isItalic || hasFontFlag(font, "italic"),
  };
}

function hasFontFlag(font: object, flag: string): boolean {
  return flag in font && Reflect.get(font, flag) === true;
}

function fontInfoFromName(rawName: string): PdfFontInfo {
  // Subset fonts carry a six-letter tag, e.g. "ABCDEF+Calibri-Bold".
  const name = rawName.replace(/^[A-Z]{6}\+/, "");
  return {
    name,
    isBold: BOLD_FONT_NAME_PATTERN.test(name),
    isItalic: ITALIC_FONT_NAME_PATTERN.test(name),
  };
}

function toExtractedFragment(item: PdfTextItem, font: PdfFontInfo): ExtractedFragment | undefined {
  const text = normalizePdfText(item.str);
  if (!text) return undefined;
  const fontSize = Math.hypot(item.transform[2], item.transform[3]);
  return {
    text,
    x: item.transform[4],
    y: item.transform[5],
    fontSize,
    height: item.height > 0 ? item.height : fontSize,
    fontName: font.name,
    isBold: font.isBold,
    isItalic: font.isItalic,
  };
}

function normalizePdfText(text: string): string | undefined {
  const normalized = text.replace(/\s+/g, " ").trim();
  return normalized.length > 0 ? normalized : undefined;
}

export const pdfExtractInternals = {
  resolveFontInfo,
  toPdfFontInfo,
  fontInfoFromName,
};
