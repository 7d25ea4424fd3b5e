import type { IncidentNode } from "../graph/types";

export interface SearchHit {
  incident_id: string;
  score: number;
}

export interface IncidentDocument {
  id: string;
  text: string;
}

/** Lexical incident search: `rank(query, limit)` returns hits with score > 0, best first. */
export interface IncidentSearchIndex {
  rank: (query: string, limit: number) => Promise<SearchHit[]>;
  upsert: (doc: IncidentDocument) => void;
  size: () => number;
}

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "in", "into", "is", "it",
  "of", "on", "or", "that", "the", "this", "to", "was", "were", "with",
]);

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((token) => token.length >= 2 && !STOPWORDS.has(token));
}

export function incidentDocument(incident: IncidentNode): IncidentDocument {
  return { id: incident.id, text: `${incident.title} ${incident.description}` };
}

interface IndexedDoc {
  id: string;
  length: number;
  termFreq: Map<string, number>;
}

export function createBm25Index(
  docs: IncidentDocument[] = [],
  options: { k1?: number; b?: number } = {},
): IncidentSearchIndex {
  const k1 = options.k1 ?? 1.2;
  const b = options.b ?? 0.75;
  const indexed = new Map<string, IndexedDoc>();

  const upsert = (doc: IncidentDocument) => {
    const tokens = tokenize(doc.text);
    const termFreq = new Map<string, number>();
    for (const token of tokens) termFreq.set(token, (termFreq.get(token) ?? 0) + 1);
    indexed.set(doc.id, { id: doc.id, length: tokens.length, termFreq });
  };

  for (const doc of docs) upsert(doc);

  return {
    upsert,
    size: () => indexed.size,
    async rank(query, limit) {
      const terms = [...new Set(tokenize(query))];
      const total = indexed.size;
      if (terms.length === 0 || total === 0 || limit <= 0) return [];

      let lengthSum = 0;
      const docFreq = new Map<string, number>();
      for (const doc of indexed.values()) {
        lengthSum += doc.length;
        for (const term of terms) {
          if (doc.termFreq.has(term)) docFreq.set(term, (docFreq.get(term) ?? 0) + 1);
        }
      }
      const avgLength = lengthSum / total || 1;

      const hits: SearchHit[] = [];
      for (const doc of indexed.values()) {
        let score = 0;
        for (const term of terms) {
          const tf = doc.termFreq.get(term) ?? 0;
          if (tf === 0) continue;
          const df = docFreq.get(term) ?? 0;
          const idf = Math.log(1 + (total - df + 0.5) / (df + 0.5));
          score += (idf * tf * (k1 + 1)) / (tf + k1 * (1 - b + (b * doc.length) / avgLength));
        }
        if (score > 0) hits.push({ incident_id: doc.id, score });
      }
      return hits
        .sort((left, right) => right.score - left.score || left.incident_id.localeCompare(right.incident_id))
        .slice(0, limit);
    },
  };
}
