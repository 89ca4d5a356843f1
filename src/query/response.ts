import { ProtocolError } from "../errors";
import type { BlockRef, Tag, TransactionEdge, TransactionNode, TransactionPage } from "../types";

type JsonObject = { [key: string]: unknown };

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

function optionalNumber(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

function parseTag(value: unknown, where: string): Tag {
  if (!isObject(value) || typeof value.name !== "string" || typeof value.value !== "string") {
    throw new ProtocolError(`Malformed tag at ${where}`, value);
  }
  return { name: value.name, value: value.value };
}

function parseBlock(value: unknown): BlockRef | null {
  if (!isObject(value)) return null;
  return { timestamp: optionalNumber(value.timestamp), height: optionalNumber(value.height) };
}

function parseNode(value: unknown, where: string): TransactionNode {
  if (!isObject(value) || typeof value.id !== "string") {
    throw new ProtocolError(`Missing node id at ${where}`, value);
  }

  const rawTags = value.tags ?? [];
  if (!Array.isArray(rawTags)) throw new ProtocolError(`Malformed tags at ${where}`, rawTags);

  const data = isObject(value.data) ? optionalString(value.data.size) : null;
  const owner = isObject(value.owner) ? optionalString(value.owner.address) : null;
  const originalId = optionalString(value.original_id);

  return {
    id: value.id,
    ...(originalId !== null ? { original_id: originalId } : {}),
    recipient: optionalString(value.recipient),
    ingested_at: optionalNumber(value.ingested_at),
    block: parseBlock(value.block),
    tags: rawTags.map((tag, i) => parseTag(tag, `${where}.tags[${i}]`)),
    data: data !== null ? { size: data } : null,
    owner: owner !== null ? { address: owner } : null,
  };
}

/**
 * Validate one `{ cursor, node }` edge. Also used for checkpoint files,
 * which hold edges in the same shape (plus `original_id` on duplicates).
 */
export function parseEdge(value: unknown, where = "edge"): TransactionEdge {
  if (!isObject(value) || typeof value.cursor !== "string") {
    throw new ProtocolError(`Missing cursor at ${where}`, value);
  }
  return { cursor: value.cursor, node: parseNode(value.node, `${where}.node`) };
}

export function parseEdges(value: unknown, where = "edges"): TransactionEdge[] {
  if (!Array.isArray(value)) throw new ProtocolError(`Expected an array at ${where}`, value);
  return value.map((edge, i) => parseEdge(edge, `${where}[${i}]`));
}

/**
 * Turn a raw GraphQL response body into a page. GraphQL `errors`, a missing
 * `data.transactions`, or a missing `count` when one was asked for all raise
 * ProtocolError.
 */
export function parseTransactionsResponse(body: unknown, wantCount: boolean): TransactionPage {
  if (!isObject(body)) {
    throw new ProtocolError("Response body is not a JSON object", body);
  }
  if (body.errors !== undefined) {
    throw new ProtocolError(`GraphQL errors: ${JSON.stringify(body.errors)}`, body.errors);
  }
  if (!isObject(body.data) || !isObject(body.data.transactions)) {
    throw new ProtocolError("Response is missing data.transactions", body);
  }

  const transactions = body.data.transactions;
  const edges = parseEdges(transactions.edges, "data.transactions.edges");

  if (!wantCount) return { edges };

  const raw = transactions.count;
  const count = typeof raw === "string" && /^\d+$/.test(raw) ? Number(raw) : raw;
  if (typeof count !== "number" || !Number.isInteger(count)) {
    throw new ProtocolError("Response is missing data.transactions.count", transactions);
  }
  return { edges, totalCount: count };
}
