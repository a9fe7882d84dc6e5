import { dirname, join, resolve } from "path";

import { expect } from "chai";

import { InvalidConfigError } from "../../../errors/jobErrors.js";
import { buildRunSettings, parsePageRangeParts, parsePageRanges } from "../../../services/settingsService.js";
import { TEST_CONFIG } from "../../utils/fakes.js";

describe("page ranges", () => {
  it("expands single pages and closed ranges in order", () => {
    expect(parsePageRanges("3-5,1", 10)).to.deep.equal([1, 3, 4, 5]);
  });

  it("expands open ranges against the page count", () => {
    expect(parsePageRanges("8-", 10)).to.deep.equal([8, 9, 10]);
    expect(parsePageRanges("-2", 10)).to.deep.equal([1, 2]);
  });

  it("removes duplicates and tolerates spaces", () => {
    expect(parsePageRanges("4, 2 - 3 ,4", 10)).to.deep.equal([2, 3, 4]);
    expect(parsePageRanges("1,2,1-,-3,3-5", 6)).to.deep.equal([1, 2, 3, 4, 5, 6]);
  });

  it("drops pages past the end of the document", () => {
    expect(parsePageRanges("9-12", 10)).to.deep.equal([9, 10]);
    expect(parsePageRanges("12", 10)).to.deep.equal([]);
  });

  it("describes open ranges without a page count", () => {
    expect(parsePageRangeParts("2-,7")).to.deep.equal([
      { start: 2, end: null },
      { start: 7, end: 7 },
    ]);
  });

  it("rejects malformed parts", () => {
    for (const spec of ["a", "5-3", "0", "-", "3 4", "1-2-3"]) {
      expect(() => parsePageRangeParts(spec), spec).to.throw(InvalidConfigError, "Invalid page range");
    }
    expect(() => parsePageRangeParts("1,5-3")).to.throw(InvalidConfigError, 'Invalid page range "5-3" in "1,5-3"');
  });

  it("rejects an expression without pages", () => {
    expect(() => parsePageRangeParts(" , ")).to.throw(InvalidConfigError, 'Page range " , " selects no pages');
  });
});

describe("buildRunSettings", () => {
  it("fills in defaults and resolves paths", () => {
    const settings = buildRunSettings(TEST_CONFIG, { inputPath: "docs/paper.txt" });

    expect(settings.inputPath).to.equal(resolve("docs/paper.txt"));
    expect(settings.outputDir).to.equal(dirname(resolve("docs/paper.txt")));
    expect(settings.langIn).to.equal("en");
    expect(settings.langOut).to.equal("zh");
    expect(settings.qps).to.equal(100);
    expect(settings.minTextLength).to.equal(5);
    expect(settings.customSystemPrompt).to.equal(null);
    expect(settings.engine).to.deep.equal({
      type: "openai",
      apiKey: "test-secret",
      baseUrl: "https://api.openai.com/v1",
      model: "gpt-4o-mini",
    });
    expect(settings.pdf).to.deep.equal({
      noDual: false,
      noMono: false,
      watermarkOutputMode: "watermarked",
      pages: null,
      maxPagesPerPart: null,
      enhanceCompatibility: false,
    });
  });

  it("freezes the settings and their parts", () => {
    const settings = buildRunSettings(TEST_CONFIG, { inputPath: "paper.txt" });

    expect(Object.isFrozen(settings)).to.equal(true);
    expect(Object.isFrozen(settings.pdf)).to.equal(true);
    expect(Object.isFrozen(settings.engine)).to.equal(true);
  });

  it("applies per-run overrides", () => {
    const outputDir = join("build", "out");
    const settings = buildRunSettings(TEST_CONFIG, {
      inputPath: "paper.txt",
      outputDir,
      langIn: "de",
      langOut: "fr",
      noDual: true,
      watermarkOutputMode: "both",
      pages: " 1-3 ",
      maxPagesPerPart: 2,
      enhanceCompatibility: true,
    });

    expect(settings.outputDir).to.equal(resolve(outputDir));
    expect(settings.langIn).to.equal("de");
    expect(settings.langOut).to.equal("fr");
    expect(settings.pdf).to.deep.equal({
      noDual: true,
      noMono: false,
      watermarkOutputMode: "both",
      pages: "1-3",
      maxPagesPerPart: 2,
      enhanceCompatibility: true,
    });
  });

  it("treats a blank page expression as every page", () => {
    expect(buildRunSettings(TEST_CONFIG, { inputPath: "paper.txt", pages: "   " }).pdf.pages).to.equal(null);
  });

  it("rejects an invalid page expression up front", () => {
    expect(() => buildRunSettings(TEST_CONFIG, { inputPath: "paper.txt", pages: "x" })).to.throw(
      InvalidConfigError,
      'Invalid page range "x" in "x"'
    );
  });

  it("rejects an invalid part size", () => {
    expect(() => buildRunSettings(TEST_CONFIG, { inputPath: "paper.txt", maxPagesPerPart: 0 })).to.throw(
      InvalidConfigError,
      "max_pages_per_part must be a positive integer (got 0)"
    );
    expect(() => buildRunSettings(TEST_CONFIG, { inputPath: "paper.txt", maxPagesPerPart: 2.5 })).to.throw(
      InvalidConfigError,
      "max_pages_per_part must be a positive integer (got 2.5)"
    );
  });

  it("refuses to disable both outputs", () => {
    expect(() => buildRunSettings(TEST_CONFIG, { inputPath: "paper.txt", noDual: true, noMono: true })).to.throw(
      InvalidConfigError,
      "Both mono and dual output are disabled"
    );
  });

  it("requires an input document", () => {
    expect(() => buildRunSettings(TEST_CONFIG, { inputPath: "  " })).to.throw(
      InvalidConfigError,
      "An input document is required"
    );
  });

  it("validates the config", () => {
    const config = { ...TEST_CONFIG, openai: { ...TEST_CONFIG.openai, apiKey: "" } };
    expect(() => buildRunSettings(config, { inputPath: "paper.txt" })).to.throw(
      InvalidConfigError,
      "Missing OpenAI API key"
    );
  });
});
