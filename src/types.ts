// ==================== Records ====================

export type Tag = {
  name: string;
  value: string;
};

export type BlockRef = {
  timestamp: number | null;
  height: number | null;
};

export type TransactionNode = {
  id: string;
  /** Set only on renamed duplicates: the id the upstream actually sent. */
  original_id?: string;
  recipient: string | null;
  ingested_at: number | null;
  block: BlockRef | null;
  tags: Tag[];
  data: { size: string } | null;
  owner: { address: string } | null;
};

export type TransactionEdge = {
  cursor: string;
  node: TransactionNode;
};

// ==================== Filters ====================

export const SUMMARY_QUERY_TYPES = [
  "sent",
  "sent_process",
  "sent_action_catch",
  "received",
  "received_action_entityCreate",
  "received_action_entityUpdatePosition",
  "received_action_chatMessage",
  "debit",
  "credit",
  "transfer",
  "token_transfers",
  "token_transfers_from_process",
] as const;

export type SummaryQueryType = (typeof SUMMARY_QUERY_TYPES)[number];

export const DETAILS_QUERY_TYPES = ["resulting", "linked"] as const;

export type DetailsQueryType = (typeof DETAILS_QUERY_TYPES)[number];

/** Inclusive bounds; either side may be left open. */
export type Bounds = {
  min?: number;
  max?: number;
};

export type SummaryFilter = {
  kind: "summary";
  entityId: string;
  queryType: SummaryQueryType;
  ingestedAt: Bounds;
  block: Bounds;
  searchTagsFromProcess?: string;
};

export type DetailsFilter = {
  kind: "details";
  messageId: string;
  fromProcessId: string;
  queryType: DetailsQueryType;
};

export type TransactionFilter = SummaryFilter | DetailsFilter;

// ==================== Paging ====================

export type PageRequest = {
  filter: TransactionFilter;
  /** Empty string starts from the beginning of the result ordering. */
  cursor: string;
  limit: number;
  wantCount: boolean;
};

export type TransactionPage = {
  edges: TransactionEdge[];
  totalCount?: number;
};

export type PageOutcome =
  | { status: "ok"; page: TransactionPage; attempts: number }
  | { status: "exhausted"; cursor: string; error: unknown; attempts: number };

export type RetryPolicy = {
  attempts: number;
  delayMs: number;
};

/** Anything that can serve one page of transactions for a cursor. */
export interface PageSource {
  fetchPage(request: PageRequest, policy?: RetryPolicy): Promise<PageOutcome>;
}
