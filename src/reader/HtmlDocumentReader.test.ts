import { describe, expect, it, vi } from "vitest";
import type { FileMetadata } from "../types";
import { HtmlDocumentReader } from "./HtmlDocumentReader";

vi.mock("../utils/logger");

const file = (name: string): FileMetadata => ({ name, extension: ".html", size: 0 });

const parse = (html: string, name = "page.html") =>
  new HtmlDocumentReader().parse(Buffer.from(html), file(name));

const GUIDE = `<html><head><title>Guide</title></head><body>
<h1>Getting Started</h1>
<p>Install the <strong>package</strong> first.</p>
<ul><li>Step one<ul><li>Detail</li></ul></li><li>Step two</li></ul>
<pre><code class="language-ts">const x = 1;</code></pre>
<table><thead><tr><th>Name</th><th align="right">Size</th></tr></thead><tbody><tr><td>a</td><td>1</td></tr></tbody></table>
<figure><img src="chart.png" alt="Chart"><figcaption>Sales chart</figcaption></figure>
<script>alert(1)</script>
</body></html>`;

describe("HtmlDocumentReader", () => {
  it("classifies blocks in reading order", () => {
    const raw = parse(GUIDE);

    expect(raw.readerType).toBe("HtmlDocumentReader");
    expect(raw.blocks).toEqual([
      { type: "heading", content: "Getting Started", headingLevel: 1, order: 0 },
      { type: "paragraph", content: "Install the **package** first.", order: 1 },
      { type: "listItem", content: "Step one", listLevel: 0, isOrderedList: false, order: 2 },
      { type: "listItem", content: "Detail", listLevel: 1, isOrderedList: false, order: 3 },
      { type: "listItem", content: "Step two", listLevel: 0, isOrderedList: false, order: 4 },
      { type: "codeBlock", content: "const x = 1;", language: "ts", order: 5 },
    ]);
  });

  it("extracts tables with headers and alignments", () => {
    const raw = parse(GUIDE);

    expect(raw.tables).toEqual([
      {
        cells: [["a", "1"]],
        headers: ["Name", "Size"],
        hasHeader: true,
        columnAlignments: ["left", "right"],
        confidence: 1,
        needsLlmAssist: false,
        order: 6,
      },
    ]);
  });

  it("records figures as images with their caption", () => {
    const raw = parse(GUIDE);

    expect(raw.images).toHaveLength(1);
    expect(raw.images[0]).toMatchObject({
      id: "image_1",
      mimeType: "image/png",
      source: "chart.png",
      caption: "Sales chart",
      position: 7,
    });
  });

  it("converts the body to markdown as the text fallback", () => {
    const raw = parse(GUIDE);

    expect(raw.text).toMatch(/^# Getting Started\n\nInstall the \*\*package\*\* first\./);
    expect(raw.text).not.toContain("alert");
  });

  it("decodes inline images", () => {
    const raw = parse('<p><img src="data:image/png;base64,iVBORw==" alt="Logo"></p>');

    expect(raw.blocks).toEqual([]);
    expect(raw.images[0]).toMatchObject({
      mimeType: "image/png",
      source: undefined,
      caption: "Logo",
      position: 0,
    });
    expect(Array.from(raw.images[0].data ?? [])).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });

  it("lowers confidence for tables with merged cells", () => {
    const raw = parse(
      '<table><tr><td colspan="2">x</td></tr><tr><td>a</td><td>b</td></tr></table>',
    );

    expect(raw.tables[0]).toMatchObject({
      cells: [["x"], ["a", "b"]],
      hasHeader: false,
      confidence: 0.6,
    });
    expect(raw.warnings).toEqual(["Table 1 uses merged cells; its layout is approximate"]);
  });

  it("collects loose text into paragraphs", () => {
    const raw = parse("<div>Loose <em>text</em> here<p>Para</p></div><ol><li>First</li></ol>");

    expect(raw.blocks).toEqual([
      { type: "paragraph", content: "Loose text here", order: 0 },
      { type: "paragraph", content: "Para", order: 1 },
      { type: "listItem", content: "First", listLevel: 0, isOrderedList: true, order: 2 },
    ]);
  });

  it("warns about an empty document", () => {
    const raw = parse("<html><body></body></html>", "empty.html");

    expect(raw.text).toBe("");
    expect(raw.blocks).toEqual([]);
    expect(raw.warnings).toEqual(["empty.html contains no text"]);
  });
});
