export type { TextExtractor } from "./interface.js";
export { decodeText } from "./decode.js";
export { docxToText, pdfToText, xlsxToText } from "./documents.js";
export { htmlToText } from "./html.js";
export {
  createTextExtractor,
  splitDelimitedLine,
  type TextExtractorOptions,
} from "./text.js";
