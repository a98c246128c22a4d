/**
 * Maps raw bytes to searchable text.
 * Implementations never reject: unextractable content yields "".
 */
export interface TextExtractor {
  /**
   * @param typeHint - lower-cased file suffix without the dot ("txt", "pdf")
   */
  extract(content: Uint8Array, typeHint: string): Promise<string>;

  /** Whether `typeHint` has a dedicated extraction routine. */
  supports(typeHint: string): boolean;
}
