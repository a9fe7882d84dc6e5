/**
 * Run settings - the immutable description of one translation run.
 */

export type EngineVendor = 'openai';

export type WatermarkOutputMode = 'watermarked' | 'no_watermark' | 'both';

export const WATERMARK_OUTPUT_MODES: readonly WatermarkOutputMode[] = ['watermarked', 'no_watermark', 'both'];

export interface OpenAIEngineSettings {
  type: 'openai';
  apiKey: string;
  baseUrl: string;
  model: string;
}

export type EngineSettings = OpenAIEngineSettings;

export interface PdfSettings {
  noDual: boolean;
  noMono: boolean;
  watermarkOutputMode: WatermarkOutputMode;
  /** Page-range expression such as `1,2,1-,-3,3-5`; null means every page. */
  pages: string | null;
  /** Pages per part when a document is translated in parts; null disables parts. */
  maxPagesPerPart: number | null;
  enhanceCompatibility: boolean;
}

export interface RunSettings {
  inputPath: string;
  outputDir: string;
  langIn: string;
  langOut: string;
  engine: EngineSettings;
  qps: number;
  minTextLength: number;
  debug: boolean;
  customSystemPrompt: string | null;
  pdf: PdfSettings;
}

/**
 * Per-run options supplied by the caller on top of the config file.
 */
export interface RunRequest {
  inputPath: string;
  outputDir?: string | undefined;
  langIn?: string | undefined;
  langOut?: string | undefined;
  noDual?: boolean | undefined;
  noMono?: boolean | undefined;
  watermarkOutputMode?: WatermarkOutputMode | undefined;
  pages?: string | undefined;
  maxPagesPerPart?: number | undefined;
  enhanceCompatibility?: boolean | undefined;
}
