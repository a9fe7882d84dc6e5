/**
 * Result payload decoding
 *
 * The engine's `finish` payload is not contractually fixed: in-process
 * engines hand back a structured record (camelCase fields) while wire-level
 * engines send a mapping with snake_case names. Both are accepted here, with
 * the same defaults for absent fields. Anything else fails loudly.
 *
 * Accepted fields (all optional):
 *   original_pdf_path / originalPdfPath                   string | null
 *   mono_pdf_path / monoPdfPath                           string | null
 *   dual_pdf_path / dualPdfPath                           string | null
 *   no_watermark_mono_pdf_path / noWatermarkMonoPdfPath   string | null
 *   no_watermark_dual_pdf_path / noWatermarkDualPdfPath   string | null
 *   auto_extracted_glossary_path / autoExtractedGlossaryPath  string | null
 *   total_seconds / totalSeconds                          number >= 0 (default 0)
 *   peak_memory_usage / peakMemoryUsage                   number >= 0 (default 0)
 */

import { z } from "zod";

import { ResultSchemaMismatchError } from "../errors/jobErrors.js";
import { isRecord, type UnknownRecord } from "../utils/typeGuards.js";

import type { TranslationResult } from "../types/result.js";

const artifactPath = z
  .string()
  .nullish()
  .transform((value) => (value === undefined || value === null || value === "" ? null : value));

const measurement = z
  .number()
  .finite()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? 0);

const TranslationResultSchema = z.object({
  originalPdfPath: artifactPath,
  monoPdfPath: artifactPath,
  dualPdfPath: artifactPath,
  noWatermarkMonoPdfPath: artifactPath,
  noWatermarkDualPdfPath: artifactPath,
  autoExtractedGlossaryPath: artifactPath,
  totalSeconds: measurement,
  peakMemoryUsage: measurement,
});

type ResultField = keyof z.input<typeof TranslationResultSchema>;

const WIRE_FIELD_NAMES: Record<ResultField, string> = {
  originalPdfPath: "original_pdf_path",
  monoPdfPath: "mono_pdf_path",
  dualPdfPath: "dual_pdf_path",
  noWatermarkMonoPdfPath: "no_watermark_mono_pdf_path",
  noWatermarkDualPdfPath: "no_watermark_dual_pdf_path",
  autoExtractedGlossaryPath: "auto_extracted_glossary_path",
  totalSeconds: "total_seconds",
  peakMemoryUsage: "peak_memory_usage",
};

const RESULT_FIELDS: readonly ResultField[] = [
  "originalPdfPath",
  "monoPdfPath",
  "dualPdfPath",
  "noWatermarkMonoPdfPath",
  "noWatermarkDualPdfPath",
  "autoExtractedGlossaryPath",
  "totalSeconds",
  "peakMemoryUsage",
];

function normalizeFieldNames(payload: UnknownRecord): UnknownRecord {
  const normalized: UnknownRecord = {};
  for (const field of RESULT_FIELDS) {
    normalized[field] = payload[field] !== undefined ? payload[field] : payload[WIRE_FIELD_NAMES[field]];
  }
  return normalized;
}

function describeIssuePath(path: ReadonlyArray<string | number>): string {
  const field = RESULT_FIELDS.find((name) => name === path[0]);
  return field === undefined ? path.join(".") : WIRE_FIELD_NAMES[field];
}

/**
 * Decode a `finish` payload into an immutable `TranslationResult`.
 */
export function decodeTranslationResult(payload: unknown): TranslationResult {
  if (!isRecord(payload)) {
    throw new ResultSchemaMismatchError(
      `expected an object, received ${payload === null ? "null" : Array.isArray(payload) ? "array" : typeof payload}`
    );
  }

  const parsed = TranslationResultSchema.safeParse(normalizeFieldNames(payload));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${describeIssuePath(issue.path)}: ${issue.message}`)
      .join("; ");
    throw new ResultSchemaMismatchError(details, { cause: parsed.error });
  }

  return Object.freeze({ ...parsed.data });
}

/**
 * Human-readable multi-line summary of a result.
 */
export function formatTranslationResult(result: TranslationResult): string {
  return [
    "TranslationResult:",
    `  Original PDF: ${result.originalPdfPath ?? "None"}`,
    `  Mono PDF: ${result.monoPdfPath ?? "None"}`,
    `  Dual PDF: ${result.dualPdfPath ?? "None"}`,
    `  Time: ${result.totalSeconds.toFixed(2)}s`,
    `  Memory: ${result.peakMemoryUsage.toFixed(2)}`,
  ].join("\n");
}
