import { describe, expect, it } from "vitest";
import { pdfExtractInternals } from "./pdf-extract.ts";

const { fontInfoFromName, resolveFontInfo, toPdfFontInfo } = pdfExtractInternals;

describe("fontInfoFromName", () => {
  it("strips the subset tag and reads weight from the name", () => {
    expect(fontInfoFromName("ABCDEF+Calibri-Bold")).toEqual({
      name: "Calibri-Bold",
      isBold: true,
      isItalic: false,
    });
    expect(fontInfoFromName("Arial-Black").isBold).toBe(true);
    expect(fontInfoFromName("Lato-Heavy").isBold).toBe(true);
    expect(fontInfoFromName("Inter-SemiBold").isBold).toBe(true);
    expect(fontInfoFromName("Futura-DemiCondensed").isBold).toBe(true);
  });

  it("reads italic and oblique styles", () => {
    expect(fontInfoFromName("Helvetica-Oblique")).toEqual({
      name: "Helvetica-Oblique",
      isBold: false,
      isItalic: true,
    });
    expect(fontInfoFromName("QWERTY+Garamond-BoldItalic")).toEqual({
      name: "Garamond-BoldItalic",
      isBold: true,
      isItalic: true,
    });
  });

  it("leaves plain names and non-subset prefixes untouched", () => {
    expect(fontInfoFromName("Times-Roman")).toEqual({
      name: "Times-Roman",
      isBold: false,
      isItalic: false,
    });
    expect(fontInfoFromName("abcdef+Foo").name).toBe("abcdef+Foo");
  });
});

describe("toPdfFontInfo", () => {
  it("combines the font name with the font object's flags", () => {
    expect(toPdfFontInfo({ name: "ABCDEF+Minion", bold: true })).toEqual({
      name: "Minion",
      isBold: true,
      isItalic: false,
    });
    expect(toPdfFontInfo({ name: "Minion", black: true })?.isBold).toBe(true);
    expect(toPdfFontInfo({ name: "Minion", italic: true })?.isItalic).toBe(true);
  });

  it("ignores flags that are not literally true", () => {
    expect(toPdfFontInfo({ name: "Minion", bold: "yes", italic: 1 })).toEqual({
      name: "Minion",
      isBold: false,
      isItalic: false,
    });
  });

  it("returns undefined for values without a font name", () => {
    expect(toPdfFontInfo(null)).toBeUndefined();
    expect(toPdfFontInfo("Minion")).toBeUndefined();
    expect(toPdfFontInfo({ bold: true })).toBeUndefined();
  });
});

describe("resolveFontInfo", () => {
  const noLoadedFonts = { has: () => false, get: () => undefined };

  it("prefers the loaded font object", () => {
    const loadedFonts = { has: () => true, get: () => ({ name: "XYZABC+Lato-Italic" }) };
    expect(resolveFontInfo(loadedFonts, "g_d0_f1", {})).toEqual({
      name: "Lato-Italic",
      isBold: false,
      isItalic: true,
    });
  });

  it("falls back to the text style's font family, then to the font id", () => {
    expect(resolveFontInfo(noLoadedFonts, "g_d0_f1", { g_d0_f1: { fontFamily: "serif" } })).toEqual({
      name: "serif",
      isBold: false,
      isItalic: false,
    });
    expect(resolveFontInfo(noLoadedFonts, "g_d0_f2", {}).name).toBe("g_d0_f2");
  });
});
