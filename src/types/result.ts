/**
 * Outcome of a completed run. Artifact paths are null when the run did not
 * produce that artifact.
 */
export interface TranslationResult {
  readonly originalPdfPath: string | null;
  readonly monoPdfPath: string | null;
  readonly dualPdfPath: string | null;
  readonly noWatermarkMonoPdfPath: string | null;
  readonly noWatermarkDualPdfPath: string | null;
  readonly autoExtractedGlossaryPath: string | null;
  /** Wall-clock duration of the run in seconds. */
  readonly totalSeconds: number;
  /** Peak resident memory observed during the run, in MiB. */
  readonly peakMemoryUsage: number;
}
