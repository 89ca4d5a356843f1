import type { TransactionEdge } from "../types";

/** Occurrence count per upstream id, owned by a single crawl. */
export type SeenIds = Map<string, number>;

export type PageFilterResult = {
  kept: TransactionEdge[];
  duplicates: number;
  nonFinal: number;
};

/** A record is final once its block has an integer height. */
export function isFinal(edge: TransactionEdge): boolean {
  const block = edge.node.block;
  return block !== null && Number.isInteger(block.height);
}

/**
 * Rebuild occurrence counts from records that were already emitted, e.g. a
 * loaded checkpoint, so renaming continues where the earlier run stopped.
 */
export function seedSeenIds(edges: TransactionEdge[]): SeenIds {
  const seen: SeenIds = new Map();
  for (const edge of edges) {
    const id = edge.node.original_id ?? edge.node.id;
    seen.set(id, (seen.get(id) ?? 0) + 1);
  }
  return seen;
}

/**
 * Count every incoming id and rename repeats: the Nth occurrence (N >= 2)
 * becomes "{N-1}-{id}" with `original_id` set. When `includeNonFinal` is
 * false, non-final records are dropped after being counted. Input order is
 * preserved.
 */
export function processPage(
  edges: TransactionEdge[],
  seenIds: SeenIds,
  includeNonFinal: boolean
): PageFilterResult {
  const kept: TransactionEdge[] = [];
  let duplicates = 0;
  let nonFinal = 0;

  for (const edge of edges) {
    const id = edge.node.id;
    const occurrence = (seenIds.get(id) ?? 0) + 1;
    seenIds.set(id, occurrence);

    let record = edge;
    if (occurrence > 1) {
      duplicates++;
      record = {
        ...edge,
        node: { ...edge.node, id: `${occurrence - 1}-${id}`, original_id: id },
      };
    }

    if (!includeNonFinal && !isFinal(record)) {
      nonFinal++;
      continue;
    }

    kept.push(record);
  }

  return { kept, duplicates, nonFinal };
}
