export interface SectionMetadata {
  exits?: number[];
  title?: string;
  source?: string;
}

export interface SectionRecord {
  sectionId: number;
  content: string;
  metadata: SectionMetadata;
  score: number;
}

/** Secondary context keeps the record shape with its content cut to a preview. */
export interface RetrievalResult {
  primary: SectionRecord | null;
  secondary: SectionRecord[];
  mismatch: boolean;
}

export interface SectionSearch {
  search(bookId: string, query: string, k: number): Promise<SectionRecord[]>;
  getBySection(bookId: string, sectionId: number): Promise<SectionRecord | null>;
}

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}
