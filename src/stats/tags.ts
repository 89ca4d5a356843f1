import type { TransactionEdge } from "../types";

/** First value of tag `name`, or undefined. */
export function tagValue(edge: TransactionEdge, name: string): string | undefined {
  return edge.node.tags.find((tag) => tag.name === name)?.value;
}

export function tagValues(edge: TransactionEdge, name: string): string[] {
  return edge.node.tags.filter((tag) => tag.name === name).map((tag) => tag.value);
}

export function hasTag(edge: TransactionEdge, name: string, value?: string): boolean {
  return edge.node.tags.some(
    (tag) => tag.name === name && (value === undefined || tag.value === value)
  );
}
