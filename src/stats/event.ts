import type { TransactionEdge } from "../types";
import { tagValue, tagValues } from "./tags";

// ==================== Ticket Sales ====================

/** Token quantity paid per ticket (raw units). */
export const TICKET_PRICE = 5_000_000_000_000n;

export type TicketSales = {
  transfers: number;
  /** Sum of Quantity tags, raw units, as a decimal string. */
  totalQuantity: string;
  tickets: number;
  /** Transfers without a usable Quantity tag; not counted. */
  skipped: number;
};

function quantityOf(edge: TransactionEdge): bigint | undefined {
  const quantity = tagValue(edge, "Quantity");
  return quantity !== undefined && /^\d+$/.test(quantity) ? BigInt(quantity) : undefined;
}

function toTickets(total: bigint, price: bigint): number {
  return Number(total / price) + Number(total % price) / Number(price);
}

export function countTicketSales(
  transfers: TransactionEdge[],
  price: bigint = TICKET_PRICE
): TicketSales {
  let total = 0n;
  let skipped = 0;

  for (const edge of transfers) {
    const quantity = quantityOf(edge);
    if (quantity === undefined) {
      skipped++;
      continue;
    }
    total += quantity;
  }

  return {
    transfers: transfers.length,
    totalQuantity: total.toString(),
    tickets: toTickets(total, price),
    skipped,
  };
}

export type TicketSalesPoint = {
  ingested_at: number;
  /** Tickets sold up to and including this transfer. */
  tickets: number;
};

/**
 * Running ticket total over ingest time, oldest first. Transfers without an
 * ingest time or a usable Quantity are left out.
 */
export function cumulativeTicketSales(
  transfers: TransactionEdge[],
  price: bigint = TICKET_PRICE
): TicketSalesPoint[] {
  const dated: Array<{ at: number; quantity: bigint }> = [];
  for (const edge of transfers) {
    const quantity = quantityOf(edge);
    const at = edge.node.ingested_at;
    if (quantity !== undefined && at !== null) dated.push({ at, quantity });
  }
  dated.sort((a, b) => a.at - b.at);

  let total = 0n;
  return dated.map(({ at, quantity }) => {
    total += quantity;
    return { ingested_at: at, tickets: toTickets(total, price) };
  });
}

// ==================== Catches ====================

export const CATCH_TYPES: Record<number, string> = {
  2: "Common",
  3: "Rare",
  4: "Legendary",
  5: "Crown",
  6: "MessageBottle",
  7: "Boot",
  8: "Chips",
  9: "Hat",
  10: "Trash",
};

export type CatchCounts = {
  byType: Record<string, number>;
  /** Catch tags whose code is not in CATCH_TYPES. */
  unknown: number;
};

/** Tally every `Catch` tag by catch type name. */
export function countCatches(catches: TransactionEdge[]): CatchCounts {
  const byType: Record<string, number> = {};
  for (const name of Object.values(CATCH_TYPES)) byType[name] = 0;
  let unknown = 0;

  for (const edge of catches) {
    for (const value of tagValues(edge, "Catch")) {
      const name = CATCH_TYPES[Number(value)];
      if (name === undefined) {
        unknown++;
      } else {
        byType[name] += 1;
      }
    }
  }

  return { byType, unknown };
}
