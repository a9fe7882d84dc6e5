import { expect } from "chai";

import { parseCliArgs } from "../../../cli/args.js";
import { alignLine, renderBox } from "../../../cli/banner.js";
import { InvalidConfigError } from "../../../errors/jobErrors.js";

const plain = (text: string): string => text;

describe("parseCliArgs", () => {
  it("uses defaults when only an input is given", () => {
    const options = parseCliArgs(["-i", "paper.txt"]);

    expect(options.help).to.equal(false);
    expect(options.createConfig).to.equal(false);
    expect(options.configPath).to.equal("config/config.json");
    expect(options.run?.inputPath).to.equal("paper.txt");
    expect(options.run?.langIn).to.equal(undefined);
    expect(options.run?.noDual).to.equal(undefined);
    expect(options.run?.maxPagesPerPart).to.equal(undefined);
  });

  it("maps every run flag onto the request", () => {
    const options = parseCliArgs([
      "--input", "paper.txt",
      "-o", "out",
      "-c", "custom.json",
      "--lang-in", "de",
      "--lang-out", "fr",
      "--no-dual",
      "--watermark", "both",
      "--pages", "1-3",
      "--max-pages-per-part", "2",
      "--enhance-compatibility",
    ]);

    expect(options.configPath).to.equal("custom.json");
    expect(options.run).to.deep.equal({
      inputPath: "paper.txt",
      outputDir: "out",
      langIn: "de",
      langOut: "fr",
      noDual: true,
      noMono: undefined,
      watermarkOutputMode: "both",
      pages: "1-3",
      maxPagesPerPart: 2,
      enhanceCompatibility: true,
    });
  });

  it("returns no run without an input", () => {
    expect(parseCliArgs([]).run).to.equal(null);
    expect(parseCliArgs(["-i", " "]).run).to.equal(null);
  });

  it("recognises the standalone commands", () => {
    expect(parseCliArgs(["--help"]).help).to.equal(true);
    expect(parseCliArgs(["-h"]).help).to.equal(true);
    expect(parseCliArgs(["--create-config", "-c", "cfg.json"])).to.include({ createConfig: true, configPath: "cfg.json" });
  });

  it("rejects an unknown watermark mode", () => {
    expect(() => parseCliArgs(["-i", "a.txt", "--watermark", "sepia"])).to.throw(
      InvalidConfigError,
      '--watermark expects one of watermarked, no_watermark, both (got "sepia")'
    );
  });

  it("rejects a part size that is not a positive integer", () => {
    for (const value of ["0", "-1", "1.5", "two"]) {
      expect(() => parseCliArgs(["-i", "a.txt", `--max-pages-per-part=${value}`]), value).to.throw(
        InvalidConfigError,
        `--max-pages-per-part expects a positive integer (got "${value}")`
      );
    }
  });

  it("rejects unknown flags and stray arguments", () => {
    expect(() => parseCliArgs(["--bogus"])).to.throw(InvalidConfigError);
    expect(() => parseCliArgs(["paper.txt"])).to.throw(InvalidConfigError);
  });
});

describe("banner", () => {
  it("pads lines to the box width", () => {
    expect(alignLine("abc", 10, plain)).to.equal("│ abc    │");
    expect(alignLine("\u001b[32mabc\u001b[39m", 10, plain)).to.equal("│ \u001b[32mabc\u001b[39m    │");
  });

  it("separates sections with a rule", () => {
    expect(renderBox([["a"], ["b"]], plain, 6)).to.deep.equal(["┌────┐", "│ a  │", "├────┤", "│ b  │", "└────┘"]);
  });
});
