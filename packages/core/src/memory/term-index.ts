/**
 * Incremental TF-IDF inverted index over message text.
 *
 * Postings are updated per insert in time proportional to the number of
 * terms in the inserted text. IDF is computed at query time from the
 * current posting-list sizes, so inserts never trigger a rebuild.
 */

import { termFrequencies, tokenize } from "./tokenize.js";

export interface TermIndexHit {
  messageId: number;
  score: number;
}

export interface IndexedText {
  id: number;
  text: string;
}

export class TermIndex {
  /** term -> (message id -> term frequency), in insertion order. */
  private readonly postings = new Map<string, Map<number, number>>();
  /** message id -> (term -> term frequency). */
  private readonly documents = new Map<number, Map<string, number>>();

  get documentCount(): number {
    return this.documents.size;
  }

  get termCount(): number {
    return this.postings.size;
  }

  has(messageId: number): boolean {
    return this.documents.has(messageId);
  }

  /** Number of indexed messages containing `term`. */
  documentFrequency(term: string): number {
    return this.postings.get(term)?.size ?? 0;
  }

  /**
   * Index a message. Re-adding an id replaces its previous text.
   */
  add(messageId: number, text: string): void {
    if (this.documents.has(messageId)) {
      this.remove(messageId);
    }

    const frequencies = termFrequencies(tokenize(text));
    this.documents.set(messageId, frequencies);

    for (const [term, count] of frequencies) {
      let posting = this.postings.get(term);
      if (!posting) {
        posting = new Map();
        this.postings.set(term, posting);
      }
      posting.set(messageId, count);
    }
  }

  remove(messageId: number): boolean {
    const frequencies = this.documents.get(messageId);
    if (!frequencies) return false;

    for (const term of frequencies.keys()) {
      const posting = this.postings.get(term);
      if (!posting) continue;
      posting.delete(messageId);
      if (posting.size === 0) this.postings.delete(term);
    }
    this.documents.delete(messageId);
    return true;
  }

  /**
   * Cosine similarity between the TF-IDF vectors of the query and every
   * message sharing at least one term with it. Results are ordered by
   * score descending, then by message id descending.
   */
  query(text: string, k: number): TermIndexHit[] {
    if (k <= 0 || this.documents.size === 0) return [];

    const idfCache = new Map<string, number>();
    const idf = (term: string): number => {
      let value = idfCache.get(term);
      if (value === undefined) {
        value = this.inverseDocumentFrequency(term);
        idfCache.set(term, value);
      }
      return value;
    };

    const queryVector = new Map<string, number>();
    for (const [term, count] of termFrequencies(tokenize(text))) {
      // Terms never seen in the corpus carry no weight.
      if (!this.postings.has(term)) continue;
      queryVector.set(term, count * idf(term));
    }
    if (queryVector.size === 0) return [];

    const dots = new Map<number, number>();
    for (const [term, queryWeight] of queryVector) {
      const posting = this.postings.get(term);
      if (!posting) continue;
      const termIdf = idf(term);
      for (const [messageId, count] of posting) {
        dots.set(messageId, (dots.get(messageId) ?? 0) + queryWeight * count * termIdf);
      }
    }

    const queryNorm = norm(queryVector.values());
    const hits: TermIndexHit[] = [];
    for (const [messageId, dot] of dots) {
      const frequencies = this.documents.get(messageId);
      if (!frequencies) continue;
      const weights: number[] = [];
      for (const [term, count] of frequencies) {
        weights.push(count * idf(term));
      }
      const documentNorm = norm(weights);
      if (documentNorm === 0 || queryNorm === 0) continue;
      hits.push({ messageId, score: dot / (queryNorm * documentNorm) });
    }

    hits.sort((a, b) => b.score - a.score || b.messageId - a.messageId);
    return hits.slice(0, k);
  }

  clear(): void {
    this.postings.clear();
    this.documents.clear();
  }

  /**
   * Drop everything and re-index from scratch. Recovery path only.
   */
  rebuild(entries: Iterable<IndexedText>): void {
    this.clear();
    for (const entry of entries) {
      this.add(entry.id, entry.text);
    }
  }

  private inverseDocumentFrequency(term: string): number {
    const total = this.documents.size;
    const frequency = this.documentFrequency(term);
    return Math.log((total + 1) / (frequency + 1)) + 1;
  }
}

function norm(values: Iterable<number>): number {
  let sum = 0;
  for (const value of values) sum += value * value;
  return Math.sqrt(sum);
}
