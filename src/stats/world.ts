import type { TransactionEdge } from "../types";
import { hasTag } from "./tags";

/** Messages sent straight from a wallet, i.e. not pushed by another process. */
export function userMessages(received: TransactionEdge[]): TransactionEdge[] {
  return received.filter((edge) => !hasTag(edge, "From-Process"));
}

/** Distinct owner addresses, in first-seen order. */
export function uniqueOwners(edges: TransactionEdge[]): string[] {
  const owners = new Set<string>();
  for (const edge of edges) {
    if (edge.node.owner) owners.add(edge.node.owner.address);
  }
  return [...owners];
}

export function chatMessages(received: TransactionEdge[]): TransactionEdge[] {
  return received.filter((edge) => hasTag(edge, "Action", "ChatMessage"));
}
