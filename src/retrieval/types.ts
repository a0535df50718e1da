/**
 * Retrieval Type Definitions
 */

/** Per-talk metadata stored beside each vector. */
export interface TalkMetadata {
  room: string;
  date: string;
  start: string;
  track: string;
  /** At most 200 characters */
  title: string;
}

/** One searchable document derived from a talk. */
export interface ScheduleDocument {
  id: string;
  text: string;
  metadata: TalkMetadata;
}

export interface VectorRecord extends ScheduleDocument {
  embedding: number[];
}

/** Nearest-neighbour hit. Distance is kept for inspection only. */
export interface Candidate {
  document: string;
  metadata: TalkMetadata;
  distance: number;
}

export interface RerankResult {
  index: number;
  score: number;
  reason: string;
}

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}

export interface Reranker {
  rerank(query: string, candidates: Candidate[]): Promise<RerankResult[]>;
}

/**
 * Per-session vector collection plus the schedule overview text.
 */
export interface VectorStore {
  /** Replace the session's collection wholesale. */
  replace(sessionId: string, records: VectorRecord[]): void;

  hasCollection(sessionId: string): boolean;

  count(sessionId: string): number;

  /** k nearest by cosine distance, closest first. */
  query(sessionId: string, embedding: number[], k: number): Candidate[];

  saveOverview(sessionId: string, overview: string): void;

  getOverview(sessionId: string): string | null;

  deleteSession(sessionId: string): void;
}
