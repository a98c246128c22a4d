import { load } from "cheerio";
import { decode } from "html-entities";

const BLOCK_ELEMENTS = [
  "address", "article", "aside", "blockquote", "dd", "div", "dl", "dt",
  "figcaption", "footer", "h1", "h2", "h3", "h4", "h5", "h6", "header",
  "li", "main", "nav", "ol", "p", "pre", "section", "table", "tr", "ul",
].join(", ");

/** Visible text of an HTML document, one line per block element. */
export function htmlToText(markup: string): string {
  // Entities stay encoded in the tree and are decoded once, after text()
  const $ = load(markup, { xml: { xmlMode: false, decodeEntities: false } });

  $("script, style, noscript, template").remove();
  $("br").replaceWith("\n");
  $("td, th").after(" ");
  $(BLOCK_ELEMENTS).after("\n");

  return decode($.root().text(), { level: "html5" })
    .replace(/[ \t\f\v\u00a0]+/g, " ")
    .replace(/\s*\n\s*/g, "\n")
    .trim();
}
