import { join } from "path";

import { expect } from "chai";

import {
  CancelledError,
  IncompleteRunError,
  TranslationJobError,
  isTranslationJobError,
} from "../../../errors/jobErrors.js";
import { buildRunSettings } from "../../../services/settingsService.js";
import { streamTranslation, translateDocument } from "../../../services/translationJobService.js";
import {
  BrokenEngine,
  Fail,
  HANG,
  ScriptedEngine,
  TEST_CONFIG,
  captureRejection,
  makeTempDir,
  writeTempFile,
} from "../../utils/fakes.js";

import type { ChunkErrorEvent, ProgressUpdateEvent, TranslationEvent } from "../../../types/events.js";
import type { RunSettings } from "../../../types/settings.js";

const progress = (stage: string, stageProgress: number, overall: number): Record<string, unknown> => ({
  type: "progress_update",
  stage,
  stage_progress: stageProgress,
  overall_progress: overall,
});

const finish = (result: unknown = { mono_pdf_path: "/out/paper.zh.mono.txt", total_seconds: 2 }): Record<string, unknown> => ({
  type: "finish",
  translate_result: result,
});

function settingsFor(inputPath: string): Readonly<RunSettings> {
  return buildRunSettings(TEST_CONFIG, { inputPath });
}

function expectJobError(error: unknown, code: string): TranslationJobError {
  expect(isTranslationJobError(error), `expected a job error, got ${String(error)}`).to.equal(true);
  if (!(error instanceof TranslationJobError)) {
    throw new Error("unreachable");
  }
  expect(error.code).to.equal(code);
  return error;
}

describe("translateDocument", () => {
  let settings: Readonly<RunSettings>;

  beforeEach(() => {
    settings = settingsFor(writeTempFile("paper.txt", "Hello world"));
  });

  it("returns the result carried by the finish event", async () => {
    const engine = new ScriptedEngine([progress("Parse Document", 100, 5), finish()]);

    const result = await translateDocument(settings, { engine });

    expect(result.monoPdfPath).to.equal("/out/paper.zh.mono.txt");
    expect(result.dualPdfPath).to.equal(null);
    expect(result.totalSeconds).to.equal(2);
    expect(engine.stats.started).to.equal(1);
  });

  it("applies defaults to a sparse result mapping", async () => {
    const result = await translateDocument(settings, { engine: new ScriptedEngine([finish({})]) });

    expect(result.originalPdfPath).to.equal(null);
    expect(result.autoExtractedGlossaryPath).to.equal(null);
    expect(result.peakMemoryUsage).to.equal(0);
  });

  it("dispatches progress and chunk errors to the observers in order", async () => {
    const seen: string[] = [];
    const engine = new ScriptedEngine([
      progress("Parse Document", 100, 5),
      { type: "error", error_type: "TranslationError", error: "Page 1, paragraph 2: timeout" },
      progress("Translate Paragraphs", 100, 95),
      finish(),
    ]);

    await translateDocument(settings, {
      engine,
      onProgress: (event: ProgressUpdateEvent) => seen.push(`progress:${event.stage}`),
      onError: (event: ChunkErrorEvent) => seen.push(`error:${event.errorType}:${event.message}`),
    });

    expect(seen).to.deep.equal([
      "progress:Parse Document",
      "error:TranslationError:Page 1, paragraph 2: timeout",
      "progress:Translate Paragraphs",
    ]);
  });

  it("skips placeholders and unknown event types", async () => {
    const stages: string[] = [];
    const engine = new ScriptedEngine([null, {}, { type: "heartbeat" }, progress("Write Output", 100, 100), finish()]);

    await translateDocument(settings, { engine, onProgress: (event) => stages.push(event.stage) });

    expect(stages).to.deep.equal(["Write Output"]);
  });

  it("ignores everything after finish", async () => {
    let progressCalls = 0;
    let errorCalls = 0;
    const engine = new ScriptedEngine([
      finish(),
      progress("Late", 50, 50),
      { type: "error", error: "late" },
      finish({ mono_pdf_path: "/other" }),
    ]);

    const result = await translateDocument(settings, {
      engine,
      onProgress: () => { progressCalls += 1; },
      onError: () => { errorCalls += 1; },
    });

    expect(result.monoPdfPath).to.equal("/out/paper.zh.mono.txt");
    expect(progressCalls).to.equal(0);
    expect(errorCalls).to.equal(0);
  });

  it("keeps the result when the stream fails after finish", async () => {
    const engine = new ScriptedEngine([finish(), new Fail(new Error("late failure"))]);

    const result = await translateDocument(settings, { engine });

    expect(result.monoPdfPath).to.equal("/out/paper.zh.mono.txt");
  });

  it("reports an incomplete run when the stream ends without finish", async () => {
    const engine = new ScriptedEngine([progress("Parse Document", 0, 0), null]);

    const error = await captureRejection(translateDocument(settings, { engine }));

    expect(error).to.be.instanceOf(IncompleteRunError);
    const jobError = expectJobError(error, "INCOMPLETE_RUN");
    expect(jobError.message).to.equal("Translation stream closed after 1 event(s) without a finish event");
  });

  it("reports an empty stream as incomplete", async () => {
    const error = await captureRejection(translateDocument(settings, { engine: new ScriptedEngine([]) }));
    expectJobError(error, "INCOMPLETE_RUN");
  });

  it("checks the input before starting the engine", async () => {
    const engine = new ScriptedEngine([finish()]);
    const missing = settingsFor(join(makeTempDir(), "missing.txt"));

    const error = await captureRejection(translateDocument(missing, { engine }));

    const jobError = expectJobError(error, "INPUT_NOT_FOUND");
    expect(jobError.message).to.equal(`Input document not found: ${missing.inputPath}`);
    expect(engine.stats.started).to.equal(0);
  });

  it("treats a directory as a missing input", async () => {
    const engine = new ScriptedEngine([finish()]);
    const error = await captureRejection(translateDocument(settingsFor(makeTempDir()), { engine }));

    expectJobError(error, "INPUT_NOT_FOUND");
    expect(engine.stats.started).to.equal(0);
  });

  it("wraps a failing stream as a transport failure and keeps the cause", async () => {
    const cause = new Error("socket closed");
    let progressCalls = 0;
    const engine = new ScriptedEngine([progress("Parse Document", 0, 0), new Fail(cause)]);

    const error = await captureRejection(
      translateDocument(settings, { engine, onProgress: () => { progressCalls += 1; } })
    );

    const jobError = expectJobError(error, "TRANSPORT_FAILURE");
    expect(jobError.message).to.equal("Translation stream failed: socket closed");
    expect(jobError.cause).to.equal(cause);
    expect(progressCalls).to.equal(1);
    expect(engine.stats.returnCalls).to.equal(0);
  });

  it("wraps an engine that cannot open a stream", async () => {
    const error = await captureRejection(
      translateDocument(settings, { engine: new BrokenEngine(new Error("no credentials")) })
    );

    expect(expectJobError(error, "TRANSPORT_FAILURE").message).to.equal("Translation stream failed: no credentials");
  });

  it("fails with a schema mismatch on an unusable result", async () => {
    const engine = new ScriptedEngine([finish("done")]);

    const error = await captureRejection(translateDocument(settings, { engine }));

    expectJobError(error, "RESULT_SCHEMA_MISMATCH");
    expect(engine.stats.returnCalls).to.equal(1);
  });

  it("does not start the engine when already cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const engine = new ScriptedEngine([finish()]);

    const error = await captureRejection(translateDocument(settings, { engine, signal: controller.signal }));

    expect(error).to.be.instanceOf(CancelledError);
    expect(engine.stats.started).to.equal(0);
  });

  it("stops between events when cancelled by an observer", async () => {
    const controller = new AbortController();
    const engine = new ScriptedEngine([progress("Parse Document", 0, 0), progress("Parse Document", 100, 5), finish()]);

    const error = await captureRejection(
      translateDocument(settings, {
        engine,
        signal: controller.signal,
        onProgress: () => controller.abort("user stop"),
      })
    );

    expect(expectJobError(error, "CANCELLED").message).to.equal("Translation run was cancelled: user stop");
    expect(engine.stats.nextCalls).to.equal(1);
    expect(engine.stats.returnCalls).to.equal(1);
  });

  it("abandons a stalled engine when cancelled", async () => {
    const controller = new AbortController();
    const engine = new ScriptedEngine([progress("Parse Document", 0, 0), HANG]);

    const error = await captureRejection(
      translateDocument(settings, {
        engine,
        signal: controller.signal,
        onProgress: () => {
          setTimeout(() => controller.abort("timeout"), 10);
        },
      })
    );

    expect(expectJobError(error, "CANCELLED").message).to.equal("Translation run was cancelled: timeout");
    expect(engine.stats.returnCalls).to.equal(1);
  });

  it("does not release a stream that already ended", async () => {
    const engine = new ScriptedEngine([finish()]);
    await translateDocument(settings, { engine });

    expect(engine.stats.returnCalls).to.equal(0);
  });
});

describe("streamTranslation", () => {
  let settings: Readonly<RunSettings>;

  beforeEach(() => {
    settings = settingsFor(writeTempFile("notes.txt", "Some notes"));
  });

  it("yields decoded events and returns the result", async () => {
    const engine = new ScriptedEngine([null, progress("Parse Document", 100, 5), { type: "error" }, finish()]);
    const stream = streamTranslation(settings, { engine });
    const events: TranslationEvent[] = [];

    let step = await stream.next();
    while (!step.done) {
      events.push(step.value);
      step = await stream.next();
    }

    expect(events.map((event) => event.type)).to.deep.equal(["progress_update", "error", "finish"]);
    expect(step.value.monoPdfPath).to.equal("/out/paper.zh.mono.txt");
  });

  it("releases the engine stream exactly once when the consumer stops early", async () => {
    const engine = new ScriptedEngine([progress("Parse Document", 0, 0), progress("Parse Document", 100, 5), finish()]);
    const seen: string[] = [];

    for await (const event of streamTranslation(settings, { engine })) {
      seen.push(event.type);
      break;
    }

    expect(seen).to.deep.equal(["progress_update"]);
    expect(engine.stats.nextCalls).to.equal(1);
    expect(engine.stats.returnCalls).to.equal(1);
  });

  it("does not touch the engine until the first pull", async () => {
    const engine = new ScriptedEngine([finish()]);
    const stream = streamTranslation(settings, { engine });

    expect(engine.stats.started).to.equal(0);
    await stream.next();
    expect(engine.stats.started).to.equal(1);
    expect((await stream.next()).done).to.equal(true);
  });
});
