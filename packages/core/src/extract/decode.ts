const UTF8_BOM = [0xef, 0xbb, 0xbf];

function startsWith(content: Uint8Array, prefix: number[]): boolean {
  return prefix.every((byte, i) => content[i] === byte);
}

/**
 * Decodes document bytes to a string.
 * BOMs select UTF-8 / UTF-16; otherwise strict UTF-8, then latin1.
 */
export function decodeText(content: Uint8Array): string {
  if (startsWith(content, UTF8_BOM)) {
    return new TextDecoder("utf-8").decode(content.subarray(3));
  }
  if (startsWith(content, [0xff, 0xfe])) {
    return new TextDecoder("utf-16le").decode(content.subarray(2));
  }
  if (startsWith(content, [0xfe, 0xff])) {
    return new TextDecoder("utf-16be").decode(content.subarray(2));
  }
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(content);
  } catch {
    return new TextDecoder("latin1").decode(content);
  }
}
