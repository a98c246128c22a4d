import { decodeText } from "./decode.js";
import { htmlToText } from "./html.js";
import { createTextExtractor, splitDelimitedLine } from "./text.js";

const encode = (text: string) => new TextEncoder().encode(text);

describe("decodeText", () => {
  it("decodes plain UTF-8", () => {
    expect(decodeText(encode("naïve résumé"))).toBe("naïve résumé");
  });

  it("drops a UTF-8 byte order mark", () => {
    const bytes = new Uint8Array([0xef, 0xbb, 0xbf, 0x68, 0x69]);
    expect(decodeText(bytes)).toBe("hi");
  });

  it("decodes UTF-16LE with a byte order mark", () => {
    const bytes = new Uint8Array([0xff, 0xfe, 0x68, 0x00, 0x69, 0x00]);
    expect(decodeText(bytes)).toBe("hi");
  });

  it("falls back to latin1 for invalid UTF-8", () => {
    const bytes = new Uint8Array([0x63, 0x61, 0x66, 0xe9]);
    expect(decodeText(bytes)).toBe("café");
  });
});

describe("splitDelimitedLine", () => {
  it("keeps delimiters inside quotes and unescapes doubled quotes", () => {
    expect(splitDelimitedLine('a,"b, c","say ""hi"""', ",")).toEqual([
      "a",
      "b, c",
      'say "hi"',
    ]);
  });

  it("splits on tabs", () => {
    expect(splitDelimitedLine("x\ty\t", "\t")).toEqual(["x", "y", ""]);
  });
});

describe("htmlToText", () => {
  it("removes markup, scripts and styles and decodes entities", () => {
    const markup =
      "<html><head><style>p{}</style><script>x()</script></head>" +
      "<body><p>Hello &amp; welcome</p>\n<p>A&#39;s &lt;b&gt;</p></body></html>";
    expect(htmlToText(markup)).toBe("Hello & welcome\nA's <b>");
  });

  it("decodes hex and named entities", () => {
    expect(htmlToText("caf&#xe9; &eacute;t&eacute; &hellip;")).toBe("café été …");
  });

  it("keeps the surrounding text when a numeric entity is out of range", () => {
    const markup = "<p>Quarterly revenue report</p><p>bad &#99999999; entity</p>";
    expect(htmlToText(markup)).toBe("Quarterly revenue report\nbad \ufffd entity");
  });

  it("breaks lines at block elements and line breaks", () => {
    const markup =
      "<h1>Title</h1><ul><li>one</li><li>two</li></ul>" +
      "<table><tr><td>a</td><td>b</td></tr></table>first<br>second";
    expect(htmlToText(markup)).toBe("Title\none\ntwo\na b\nfirst\nsecond");
  });
});

describe("createTextExtractor", () => {
  const extractor = createTextExtractor();

  it("returns plain text unchanged", async () => {
    expect(await extractor.extract(encode("# Title\nbody"), "md")).toBe("# Title\nbody");
  });

  it("flattens csv rows", async () => {
    const csv = 'name,note\n"Smith, J","said ""hi"""\n\n';
    expect(await extractor.extract(encode(csv), "csv")).toBe('name note\nSmith, J said "hi"');
  });

  it("flattens tsv rows", async () => {
    expect(await extractor.extract(encode("a\tb\n c \td"), "tsv")).toBe("a b\nc d");
  });

  it("collects json leaf values", async () => {
    const json = JSON.stringify({
      title: "Report",
      tags: ["a", "b"],
      count: 3,
      nested: { ok: true, none: null },
    });
    expect(await extractor.extract(encode(json), "json")).toBe("Report\na\nb\n3\ntrue");
  });

  it("indexes malformed json as text", async () => {
    expect(await extractor.extract(encode("{not json"), "json")).toBe("{not json");
  });

  it("treats the type hint case-insensitively", async () => {
    expect(extractor.supports("HTML")).toBe(true);
    expect(await extractor.extract(encode("<b>bold</b>"), "HTM")).toBe("bold");
  });

  it("yields empty text for unsupported types", async () => {
    expect(extractor.supports("exe")).toBe(false);
    expect(await extractor.extract(encode("MZ"), "exe")).toBe("");
  });

  it("does not treat object prototype members as types", async () => {
    for (const hint of ["constructor", "toString", "__proto__"]) {
      expect(extractor.supports(hint)).toBe(false);
      expect(await extractor.extract(encode("text"), hint)).toBe("");
    }
  });

  it("recognises the office formats", () => {
    for (const hint of ["pdf", "docx", "xlsx"]) {
      expect(extractor.supports(hint)).toBe(true);
    }
  });
});
