/**
 * Run Settings Service
 *
 * Builds the immutable `RunSettings` for one run from the resolved config and
 * the caller's per-run request. Validation happens here, once; the job
 * controller and the engine only read the result.
 */

import { dirname, resolve } from "path";

import { validateConfig, type DocshiftConfig } from "../config.js";
import { InvalidConfigError } from "../errors/jobErrors.js";

import type { PdfSettings, RunRequest, RunSettings } from "../types/settings.js";

export const DEFAULT_LANG_IN = "en";
export const DEFAULT_LANG_OUT = "zh";

const PAGE_PART_PATTERN = /^(\d*)\s*(-?)\s*(\d*)$/;

interface PageRange {
  start: number;
  /** null means "through the last page". */
  end: number | null;
}

/**
 * Parse a page-range expression without knowing the page count.
 *
 * Accepted parts, comma separated: `N`, `N-M`, `N-` (N to the last page) and
 * `-M` (first page to M).
 */
export function parsePageRangeParts(spec: string): PageRange[] {
  const ranges: PageRange[] = [];

  for (const rawPart of spec.split(",")) {
    const part = rawPart.trim();
    if (part === "") {
      continue;
    }

    const match = PAGE_PART_PATTERN.exec(part);
    const [, startText = "", dash = "", endText = ""] = match ?? [];
    if (!match || (startText === "" && endText === "") || (dash === "" && endText !== "")) {
      throw new InvalidConfigError(`Invalid page range "${part}" in "${spec}"`);
    }

    const start = startText === "" ? 1 : Number(startText);
    const end = dash === "" ? start : endText === "" ? null : Number(endText);
    if (start < 1 || (end !== null && end < start)) {
      throw new InvalidConfigError(`Invalid page range "${part}" in "${spec}"`);
    }
    ranges.push({ start, end });
  }

  if (ranges.length === 0) {
    throw new InvalidConfigError(`Page range "${spec}" selects no pages`);
  }
  return ranges;
}

/**
 * Expand a page-range expression into sorted, distinct 1-based page numbers.
 * Pages beyond `pageCount` are dropped.
 */
export function parsePageRanges(spec: string, pageCount: number): number[] {
  const pages = new Set<number>();
  for (const { start, end } of parsePageRangeParts(spec)) {
    const last = Math.min(end ?? pageCount, pageCount);
    for (let page = start; page <= last; page++) {
      pages.add(page);
    }
  }
  return [...pages].sort((a, b) => a - b);
}

function buildPdfSettings(request: RunRequest): PdfSettings {
  const pages = request.pages?.trim();
  if (pages !== undefined && pages !== "") {
    parsePageRangeParts(pages);
  }

  const maxPagesPerPart = request.maxPagesPerPart;
  if (maxPagesPerPart !== undefined && (!Number.isInteger(maxPagesPerPart) || maxPagesPerPart < 1)) {
    throw new InvalidConfigError(`max_pages_per_part must be a positive integer (got ${maxPagesPerPart})`);
  }

  const noDual = request.noDual ?? false;
  const noMono = request.noMono ?? false;
  if (noDual && noMono) {
    throw new InvalidConfigError("Both mono and dual output are disabled; nothing would be written");
  }

  return {
    noDual,
    noMono,
    watermarkOutputMode: request.watermarkOutputMode ?? "watermarked",
    pages: pages === undefined || pages === "" ? null : pages,
    maxPagesPerPart: maxPagesPerPart ?? null,
    enhanceCompatibility: request.enhanceCompatibility ?? false,
  };
}

/**
 * Validate the config and request and freeze the resulting settings.
 */
export function buildRunSettings(config: DocshiftConfig, request: RunRequest): Readonly<RunSettings> {
  validateConfig(config);

  if (request.inputPath.trim() === "") {
    throw new InvalidConfigError("An input document is required");
  }
  const inputPath = resolve(request.inputPath);

  const settings: RunSettings = {
    inputPath,
    outputDir: resolve(request.outputDir ?? dirname(inputPath)),
    langIn: request.langIn ?? DEFAULT_LANG_IN,
    langOut: request.langOut ?? DEFAULT_LANG_OUT,
    engine: Object.freeze({
      type: "openai",
      apiKey: config.openai.apiKey,
      baseUrl: config.openai.baseUrl,
      model: config.openai.model,
    }),
    qps: config.qps,
    minTextLength: config.minTextLength,
    debug: config.debug,
    customSystemPrompt: config.customSystemPrompt,
    pdf: Object.freeze(buildPdfSettings(request)),
  };

  return Object.freeze(settings);
}
