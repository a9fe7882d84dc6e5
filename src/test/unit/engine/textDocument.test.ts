import { expect } from "chai";

import { artifactFileName, enhanceCompatibility, renderDocument, type TranslatedPages } from "../../../engine/text/artifacts.js";
import { chunkPages, splitPages, splitParagraphs } from "../../../engine/text/document.js";

describe("text document model", () => {
  it("splits paragraphs on blank lines and normalises line endings", () => {
    expect(splitParagraphs("a\r\n\r\nb\n  \n\nc")).to.deep.equal(["a", "b", "c"]);
    expect(splitParagraphs("one line\nstill one paragraph")).to.deep.equal(["one line\nstill one paragraph"]);
    expect(splitParagraphs("  \n\n ")).to.deep.equal([]);
  });

  it("numbers pages from one", () => {
    expect(splitPages("first\fsecond\n\nthird")).to.deep.equal([
      { number: 1, paragraphs: ["first"] },
      { number: 2, paragraphs: ["second", "third"] },
    ]);
  });

  it("chunks selected pages into parts", () => {
    expect(chunkPages([1, 2, 3, 4, 5], 2)).to.deep.equal([[1, 2], [3, 4], [5]]);
    expect(chunkPages([2, 7], null)).to.deep.equal([[2, 7]]);
    expect(chunkPages([], 3)).to.deep.equal([]);
  });
});

describe("artifacts", () => {
  it("names artifacts after the input", () => {
    expect(artifactFileName("/docs/report.md", "de", "dual", true)).to.equal("report.de.dual.md");
    expect(artifactFileName("/docs/notes", "fr", "mono", false)).to.equal("notes.no_watermark.fr.mono.txt");
  });

  it("renders dual output only for translated paragraphs", () => {
    const pages = [{ number: 1, paragraphs: ["One", "Two"] }];
    const translations: TranslatedPages = new Map([[1, new Map([[1, "Deux"]])]]);

    expect(renderDocument(pages, translations, "mono", null, false)).to.equal("One\n\nDeux\n");
    expect(renderDocument(pages, translations, "dual", "[mark]", false)).to.equal("One\n\nTwo\nDeux\n\n[mark]\n");
  });

  it("normalises text for compatibility", () => {
    expect(enhanceCompatibility("e\u0301\u00A0x\u200By\uFEFF")).to.equal("\u00E9 xy");

    const pages = [{ number: 1, paragraphs: ["cafe\u0301"] }];
    expect(renderDocument(pages, new Map(), "mono", null, true)).to.equal("caf\u00E9\n");
  });
});
