/**
 * Output artifacts of the plain-text engine: naming, rendering and writing.
 */

import { mkdir, writeFile } from "fs/promises";
import { basename, extname, join } from "path";

import type { TextPage } from "./document.js";
import type { RunSettings } from "../../types/settings.js";

export type ArtifactKind = "mono" | "dual";

export interface ArtifactPaths {
  monoPath: string | null;
  dualPath: string | null;
  noWatermarkMonoPath: string | null;
  noWatermarkDualPath: string | null;
}

/** Translation of each paragraph, keyed by page number then paragraph index. */
export type TranslatedPages = Map<number, Map<number, string>>;

export function artifactFileName(inputPath: string, langOut: string, kind: ArtifactKind, watermarked: boolean): string {
  const extension = extname(inputPath) || ".txt";
  const stem = basename(inputPath, extname(inputPath));
  return watermarked
    ? `${stem}.${langOut}.${kind}${extension}`
    : `${stem}.no_watermark.${langOut}.${kind}${extension}`;
}

export function watermarkLine(settings: Readonly<RunSettings>): string {
  return `[Translated by docshift: ${settings.langIn} -> ${settings.langOut}]`;
}

/**
 * NFC-normalise and replace characters that older viewers render badly.
 */
export function enhanceCompatibility(text: string): string {
  return text
    .normalize("NFC")
    .replace(/\u00A0/g, " ")
    .replace(/[\u200B-\u200D\uFEFF]/g, "");
}

function translatedParagraph(translations: TranslatedPages, page: TextPage, index: number, source: string): string {
  return translations.get(page.number)?.get(index) ?? source;
}

export function renderDocument(
  pages: TextPage[],
  translations: TranslatedPages,
  kind: ArtifactKind,
  watermark: string | null,
  compatible: boolean
): string {
  const body = pages
    .map((page) =>
      page.paragraphs
        .map((source, index) => {
          const translated = translatedParagraph(translations, page, index, source);
          return kind === "dual" && translations.get(page.number)?.has(index) ? `${source}\n${translated}` : translated;
        })
        .join("\n\n")
    )
    .join("\n\f\n");

  const text = watermark === null ? `${body}\n` : `${body}\n\n${watermark}\n`;
  return compatible ? enhanceCompatibility(text) : text;
}

/**
 * Write every artifact the settings ask for and report the paths.
 */
export async function writeArtifacts(
  settings: Readonly<RunSettings>,
  pages: TextPage[],
  translations: TranslatedPages
): Promise<ArtifactPaths> {
  const paths: ArtifactPaths = { monoPath: null, dualPath: null, noWatermarkMonoPath: null, noWatermarkDualPath: null };
  const { noMono, noDual, watermarkOutputMode, enhanceCompatibility: compatible } = settings.pdf;
  const variants: boolean[] = watermarkOutputMode === "both"
    ? [true, false]
    : [watermarkOutputMode === "watermarked"];
  const kinds: ArtifactKind[] = [...(noMono ? [] : ["mono" as const]), ...(noDual ? [] : ["dual" as const])];

  await mkdir(settings.outputDir, { recursive: true });

  for (const watermarked of variants) {
    for (const kind of kinds) {
      const path = join(settings.outputDir, artifactFileName(settings.inputPath, settings.langOut, kind, watermarked));
      const content = renderDocument(pages, translations, kind, watermarked ? watermarkLine(settings) : null, compatible);
      await writeFile(path, content, "utf8");

      if (watermarked) {
        if (kind === "mono") { paths.monoPath = path; } else { paths.dualPath = path; }
      } else if (kind === "mono") {
        paths.noWatermarkMonoPath = path;
      } else {
        paths.noWatermarkDualPath = path;
      }
    }
  }

  return paths;
}
