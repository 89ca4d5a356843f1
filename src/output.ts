import * as fs from "fs";
import * as path from "path";

import { errorMessage, PersistenceError } from "./errors";
import { tagValue } from "./stats/tags";
import type { TransactionEdge } from "./types";

// ==================== CSV Utilities ====================

type CsvRow = {
  id: string;
  original_id: string;
  cursor: string;
  owner: string;
  recipient: string;
  action: string;
  ingested_at: string;
  block_height: string;
  block_timestamp: string;
  data_size: string;
};

export const csv = {
  header: [
    "id",
    "original_id",
    "cursor",
    "owner",
    "recipient",
    "action",
    "ingested_at",
    "block_height",
    "block_timestamp",
    "data_size",
  ] as const,

  escape: (value: unknown): string => {
    return `"${String(value ?? "").replace(/"/g, '""')}"`;
  },

  toRow: (edge: TransactionEdge): CsvRow => {
    const node = edge.node;
    const height = node.block?.height ?? null;
    const blockTime = node.block?.timestamp ?? null;
    return {
      id: node.id,
      original_id: node.original_id ?? "",
      cursor: edge.cursor,
      owner: node.owner?.address ?? "",
      recipient: node.recipient ?? "",
      action: tagValue(edge, "Action") ?? "",
      ingested_at: node.ingested_at === null ? "" : String(node.ingested_at),
      block_height: height === null ? "" : String(height),
      block_timestamp: blockTime === null ? "" : String(blockTime),
      data_size: node.data?.size ?? "",
    };
  },

  render: (edges: TransactionEdge[]): string => {
    const lines = edges.map((edge) => {
      const row = csv.toRow(edge);
      return csv.header.map((key) => csv.escape(row[key])).join(",");
    });
    return [csv.header.join(","), ...lines].join("\n") + "\n";
  },
};

// ==================== Files ====================

function write(file: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content, "utf8");
  } catch (error) {
    throw new PersistenceError(`Failed to write ${file}: ${errorMessage(error)}`, file);
  }
}

export function writeJson(file: string, value: unknown): void {
  write(file, JSON.stringify(value));
}

export function writeCsv(file: string, edges: TransactionEdge[]): void {
  write(file, csv.render(edges));
}
