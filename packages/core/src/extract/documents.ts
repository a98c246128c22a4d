// Parsers for binary office formats load on first use.

/** Plain text of every page of a PDF. */
export async function pdfToText(content: Uint8Array): Promise<string> {
  const { PDFParse } = await import("pdf-parse");
  // pdf.js may take ownership of the buffer it is given
  const parser = new PDFParse({ data: new Uint8Array(content) });
  try {
    const result = await parser.getText();
    return result.text.trim();
  } finally {
    await parser.destroy();
  }
}

/** Raw text of a Word document, paragraphs separated by blank lines. */
export async function docxToText(content: Uint8Array): Promise<string> {
  const { default: mammoth } = await import("mammoth");
  const result = await mammoth.extractRawText({ buffer: Buffer.from(content) });
  return result.value.trim();
}

/**
 * Cell text of every worksheet: a "Sheet: <name>" line per sheet,
 * then one line per non-empty row.
 */
export async function xlsxToText(content: Uint8Array): Promise<string> {
  const { default: ExcelJS } = await import("exceljs");
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(new Uint8Array(content).buffer);

  const lines: string[] = [];
  workbook.eachSheet((sheet) => {
    lines.push(`Sheet: ${sheet.name}`);
    sheet.eachRow((row) => {
      const cells: string[] = [];
      row.eachCell((cell) => {
        const text = cell.text.trim();
        if (text) cells.push(text);
      });
      if (cells.length > 0) lines.push(cells.join(" "));
    });
  });
  return lines.join("\n");
}
