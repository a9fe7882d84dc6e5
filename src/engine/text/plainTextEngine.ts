/**
 * Plain-text translation engine
 *
 * Reference engine for UTF-8 text documents. It emits the same wire events
 * as any other engine: progress updates per stage and per batch, an `error`
 * event for every paragraph that could not be translated, and one `finish`
 * event carrying the artifact paths.
 */

import { readFile } from "fs/promises";

import { CancelledError } from "../../errors/jobErrors.js";
import { logger } from "../../logging/index.js";
import { parsePageRanges } from "../../services/settingsService.js";
import { BatchTranslator, type TranslationItem } from "../llm/batchTranslator.js";
import { OpenAICompatibleBackend } from "../llm/openaiBackend.js";
import { RateLimiter } from "../llm/rateLimiter.js";

import { writeArtifacts, type TranslatedPages } from "./artifacts.js";
import { chunkPages, splitPages, type TextPage } from "./document.js";

import type { JsonSanitizer } from "../../parsers/json/jsonCleaning.js";
import type { RawEngineEvent, RawProgressUpdate } from "../../types/events.js";
import type { EngineSettings, RunSettings } from "../../types/settings.js";
import type { ChatBackend, SanitizerAware, TranslationEngine } from "../contracts.js";

export const STAGE_PARSE = "Parse Document";
export const STAGE_TRANSLATE = "Translate Paragraphs";
export const STAGE_WRITE = "Write Output";

// Share of overall progress owned by each stage.
const PARSE_END = 5;
const TRANSLATE_END = 95;

const DEFAULT_BATCH_SIZE = 8;
const DEFAULT_BATCH_CHARS = 4000;
const BYTES_PER_MIB = 1024 * 1024;

export interface PlainTextEngineOptions {
  backendFactory?: (engine: EngineSettings) => ChatBackend;
  /** Maximum paragraphs per model request. */
  batchSize?: number;
  /** Soft limit on source characters per model request. */
  batchChars?: number;
  now?: () => number;
  memoryUsage?: () => number;
}

interface PendingParagraph extends TranslationItem {
  page: number;
  index: number;
  part: number;
}

const defaultMemoryUsage = (): number => process.memoryUsage().rss;

function progress(
  stage: string,
  stageProgress: number,
  overallProgress: number,
  extra: Omit<RawProgressUpdate, "type" | "stage" | "stage_progress" | "overall_progress"> = {}
): RawProgressUpdate {
  return {
    type: "progress_update",
    stage,
    stage_progress: stageProgress,
    overall_progress: overallProgress,
    ...extra,
  };
}

export class PlainTextEngine implements TranslationEngine, SanitizerAware {
  readonly name = "plain-text";
  private sanitizer: JsonSanitizer | null = null;

  constructor(private readonly options: PlainTextEngineOptions = {}) {}

  useSanitizer(sanitizer: JsonSanitizer): void {
    this.sanitizer = sanitizer;
  }

  translateStream(
    settings: Readonly<RunSettings>,
    inputPath: string,
    signal?: AbortSignal
  ): AsyncIterable<RawEngineEvent> {
    return this.run(settings, inputPath, signal);
  }

  /**
   * Group paragraphs into requests by count and by source length.
   */
  batchParagraphs<T extends TranslationItem>(paragraphs: T[]): T[][] {
    const batchSize = this.options.batchSize ?? DEFAULT_BATCH_SIZE;
    const batchChars = this.options.batchChars ?? DEFAULT_BATCH_CHARS;
    const batches: T[][] = [];
    let current: T[] = [];
    let chars = 0;

    for (const paragraph of paragraphs) {
      if (current.length > 0 && (current.length >= batchSize || chars + paragraph.text.length > batchChars)) {
        batches.push(current);
        current = [];
        chars = 0;
      }
      current.push(paragraph);
      chars += paragraph.text.length;
    }
    if (current.length > 0) {
      batches.push(current);
    }
    return batches;
  }

  private createTranslator(settings: Readonly<RunSettings>): BatchTranslator {
    const backend = this.options.backendFactory
      ? this.options.backendFactory(settings.engine)
      : new OpenAICompatibleBackend(settings.engine);
    const translator = new BatchTranslator(backend, new RateLimiter(settings.qps), {
      langIn: settings.langIn,
      langOut: settings.langOut,
      customSystemPrompt: settings.customSystemPrompt,
    });
    if (this.sanitizer) {
      translator.useSanitizer(this.sanitizer);
    }
    return translator;
  }

  private collectParagraphs(
    pages: TextPage[],
    parts: number[][],
    minTextLength: number
  ): PendingParagraph[] {
    const byNumber = new Map(pages.map((page) => [page.number, page]));
    const pending: PendingParagraph[] = [];
    let id = 0;

    parts.forEach((partPages, partIndex) => {
      for (const pageNumber of partPages) {
        byNumber.get(pageNumber)?.paragraphs.forEach((text, index) => {
          if (text.trim().length >= minTextLength) {
            pending.push({ id: id++, text, page: pageNumber, index, part: partIndex + 1 });
          }
        });
      }
    });
    return pending;
  }

  private async *run(
    settings: Readonly<RunSettings>,
    inputPath: string,
    signal: AbortSignal | undefined
  ): AsyncGenerator<RawEngineEvent, void, undefined> {
    const now = this.options.now ?? Date.now;
    const memoryUsage = this.options.memoryUsage ?? defaultMemoryUsage;
    const startedAt = now();
    let peakMemory = memoryUsage();
    const sampleMemory = (): void => {
      peakMemory = Math.max(peakMemory, memoryUsage());
    };
    const checkAborted = (): void => {
      if (signal?.aborted) {
        throw new CancelledError(signal.reason);
      }
    };

    yield progress(STAGE_PARSE, 0, 0);
    const pages = splitPages(await readFile(inputPath, "utf8"));
    const selected = settings.pdf.pages === null
      ? pages.map((page) => page.number)
      : parsePageRanges(settings.pdf.pages, pages.length);
    if (selected.length === 0) {
      throw new Error(`Page selection "${settings.pdf.pages ?? ""}" matches none of the ${pages.length} page(s)`);
    }

    const parts = chunkPages(selected, settings.pdf.maxPagesPerPart);
    const paragraphs = this.collectParagraphs(pages, parts, settings.minTextLength);
    sampleMemory();
    logger.debug(`[ENGINE] ${pages.length} page(s), ${selected.length} selected, ${paragraphs.length} paragraph(s) to translate in ${parts.length} part(s)`);
    yield progress(STAGE_PARSE, 100, PARSE_END);

    const translator = this.createTranslator(settings);
    const translations: TranslatedPages = new Map();
    const batches = parts.flatMap((_, partIndex) =>
      this.batchParagraphs(paragraphs.filter((paragraph) => paragraph.part === partIndex + 1))
    );

    let batchNumber = 0;
    for (const batch of batches) {
      checkAborted();
      const outcome = await translator.translateBatch(batch, signal);
      batchNumber += 1;

      for (const paragraph of batch) {
        const translated = outcome.translations.get(paragraph.id);
        if (translated !== undefined) {
          const pageTranslations = translations.get(paragraph.page) ?? new Map<number, string>();
          pageTranslations.set(paragraph.index, translated);
          translations.set(paragraph.page, pageTranslations);
        }
      }
      for (const failure of outcome.failures) {
        const paragraph = batch.find((item) => item.id === failure.id);
        yield {
          type: "error",
          error_type: "TranslationError",
          error: `Page ${paragraph?.page ?? "?"}, paragraph ${(paragraph?.index ?? -1) + 1}: ${failure.message}`,
        };
      }

      sampleMemory();
      const stageProgress = (batchNumber / batches.length) * 100;
      yield progress(STAGE_TRANSLATE, stageProgress, PARSE_END + ((TRANSLATE_END - PARSE_END) * stageProgress) / 100, {
        stage_current: batchNumber,
        stage_total: batches.length,
        part_index: batch[0]?.part ?? 1,
        total_parts: parts.length,
      });
    }

    checkAborted();
    yield progress(STAGE_WRITE, 0, TRANSLATE_END);
    const artifacts = await writeArtifacts(settings, pages, translations);
    sampleMemory();
    yield progress(STAGE_WRITE, 100, 100);

    yield {
      type: "finish",
      translate_result: {
        original_pdf_path: inputPath,
        mono_pdf_path: artifacts.monoPath,
        dual_pdf_path: artifacts.dualPath,
        no_watermark_mono_pdf_path: artifacts.noWatermarkMonoPath,
        no_watermark_dual_pdf_path: artifacts.noWatermarkDualPath,
        auto_extracted_glossary_path: null,
        total_seconds: (now() - startedAt) / 1000,
        peak_memory_usage: peakMemory / BYTES_PER_MIB,
      },
    };
  }
}
