import type { NeighborNode, NeighborRelation } from "../graph/types";
import { TIER1_SIGNALS, type EvidenceItem, type Tier1Result } from "../types";

export const MAX_CONTEXT_HOP = 2;

export interface ContextNode {
  path: string;
  hop: number;
  relation: NeighborRelation | "root";
}

export interface ContextArena {
  /** Admits unseen nodes up to the hop cap; returns how many were added and dropped. */
  admit: (nodes: NeighborNode[]) => { added: number; dropped: number };
  has: (path: string) => boolean;
  nodes: () => ContextNode[];
  maxHopLoaded: () => number;
}

/**
 * Visited-node arena for one investigation. Nodes carry the hop they were
 * reached at; anything beyond `maxHop` is refused.
 */
export function createContextArena(
  root: string,
  seed: ContextNode[] = [],
  maxHop: number = MAX_CONTEXT_HOP,
): ContextArena {
  const order: ContextNode[] = [];
  const seen = new Map<string, ContextNode>();

  const put = (node: ContextNode) => {
    seen.set(node.path, node);
    order.push(node);
  };

  put({ path: root, hop: 0, relation: "root" });
  for (const node of seed) {
    if (!seen.has(node.path) && node.hop <= maxHop) put(node);
  }

  return {
    admit(nodes) {
      let added = 0;
      let dropped = 0;
      for (const node of nodes) {
        if (node.hop > maxHop || node.hop < 1) {
          dropped += 1;
          continue;
        }
        if (seen.has(node.path)) continue;
        put({ path: node.path, hop: node.hop, relation: node.relation });
        added += 1;
      }
      return { added, dropped };
    },
    has: (path) => seen.has(path),
    nodes: () => [...order],
    maxHopLoaded: () => order.reduce((max, node) => Math.max(max, node.hop), 0),
  };
}

export function appendEvidence(
  chain: EvidenceItem[],
  item: Omit<EvidenceItem, "id" | "at">,
  at: Date,
): EvidenceItem[] {
  const id = `E-${String(chain.length + 1).padStart(3, "0")}`;
  return [...chain, { id, at: at.toISOString(), ...item }];
}

/** Hop-0 evidence: one item per Tier-1 signal, notes for unknown or disabled ones. */
export function tier1Evidence(tier1: Tier1Result, at: Date): EvidenceItem[] {
  let chain: EvidenceItem[] = [];
  for (const name of TIER1_SIGNALS) {
    const outcome = tier1.signals[name];
    if (outcome.status === "ok") {
      chain = appendEvidence(
        chain,
        {
          hop: 0,
          kind: "tier1_signal",
          summary: outcome.result.evidence_text,
          signal: name,
          signal_level: outcome.result.signal_level,
        },
        at,
      );
    } else {
      const summary = outcome.status === "unknown" ? `${name} unknown: ${outcome.reason}` : `${name} disabled`;
      chain = appendEvidence(chain, { hop: 0, kind: "note", summary, signal: name }, at);
    }
  }
  return chain;
}
