/** One searchable document as stored in the index, keyed by store key. */
export interface IndexRecord {
  key: string;
  fileName: string;
  extractedText: string;
  fileExtension: string;
  size: number;
  modifiedAt: string;
  fingerprint: string;
  url: string; // "" when no access URL could be issued
  indexedAt: string;
}

export interface SearchHighlights {
  fileName?: string[];
  extractedText?: string[];
}

export interface SearchHit {
  key: string;
  fileName: string;
  fileExtension: string;
  size: number;
  modifiedAt: string;
  url: string;
  score: number;
  highlights: SearchHighlights;
}

export interface SearchOptions {
  size: number;
  offset: number;
}

export interface SearchResult {
  hits: SearchHit[];
  total: number;
}

export interface KeyPage {
  keys: string[];
  nextCursor: string | null;
}

export interface IndexStats {
  count: number;
  sizeBytes: number;
}
