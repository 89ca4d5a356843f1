import { ValidationError } from "../errors";
import {
  DETAILS_QUERY_TYPES,
  SUMMARY_QUERY_TYPES,
  type Bounds,
  type DetailsFilter,
  type DetailsQueryType,
  type SummaryFilter,
  type SummaryQueryType,
  type TransactionFilter,
} from "../types";

export const SORT_ORDER = "INGESTED_AT_DESC";

/** First ingest timestamp the gateway indexes for ao traffic. */
export const AO_INGEST_FLOOR = 1696107600;

type ConditionTemplate = {
  condition: string;
  /** Applied as ingested_at.min when the caller gives no lower bound. */
  ingestedFloor?: number;
};

const CREDIT_DEBIT = '{name: "Action", values: ["Credit-Notice", "Debit-Notice"]}';

// "sent" is what a wallet pushes out, "sent_process" what a process pushes out,
// "received" anything addressed to the entity.
const SUMMARY_CONDITIONS: Record<SummaryQueryType, ConditionTemplate> = {
  sent: { condition: 'tags: [{name: "Data-Protocol", values: ["ao"]}], owners: [$entityId]' },
  sent_process: { condition: 'tags: [{name: "From-Process", values: [$entityId]}]' },
  sent_action_catch: {
    condition:
      'tags: [{name: "From-Process", values: [$entityId]}, {name: "Action", values: ["Catch"]}]',
  },
  received: { condition: "recipients: [$entityId]" },
  received_action_entityCreate: {
    condition: 'tags: [{name: "Action", values: ["Reality.EntityCreate"]}], recipients: [$entityId]',
  },
  received_action_entityUpdatePosition: {
    condition:
      'tags: [{name: "Action", values: ["Reality.EntityUpdatePosition"]}], recipients: [$entityId]',
  },
  received_action_chatMessage: {
    condition: 'tags: [{name: "Action", values: ["ChatMessage"]}], recipients: [$entityId]',
  },
  debit: {
    condition: 'tags: [{name: "Action", values: ["Debit-Notice"]}], recipients: [$entityId]',
  },
  credit: {
    condition: 'tags: [{name: "Action", values: ["Credit-Notice"]}], recipients: [$entityId]',
  },
  transfer: { condition: `tags: [${CREDIT_DEBIT}], recipients: [$entityId]` },
  token_transfers: {
    condition: `tags: [${CREDIT_DEBIT}], recipients: [$entityId]`,
    ingestedFloor: AO_INGEST_FLOOR,
  },
  token_transfers_from_process: {
    condition: `tags: [${CREDIT_DEBIT}, {name: "From-Process", values: [$fromProcessId]}], recipients: [$entityId]`,
  },
};

const DETAILS_CONDITION =
  'tags: [{name: "Pushed-For", values: [$messageId]}, {name: "From-Process", values: [$fromProcessId]}]';

const NODE_FIELDS = `
        id
        recipient
        ingested_at
        block {
          timestamp
          height
        }
        tags {
          name
          value
        }
        data {
          size
        }
        owner {
          address
        }`;

// ==================== Validation ====================

export function isSummaryQueryType(value: string): value is SummaryQueryType {
  return SUMMARY_QUERY_TYPES.some((type) => type === value);
}

export function isDetailsQueryType(value: string): value is DetailsQueryType {
  return DETAILS_QUERY_TYPES.some((type) => type === value);
}

function validateBounds(name: string, bounds: Bounds): void {
  for (const [side, value] of Object.entries(bounds)) {
    if (value === undefined) continue;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
      throw new ValidationError(`${name}.${side} must be a non-negative integer`, { value });
    }
  }
  if (bounds.min !== undefined && bounds.max !== undefined && bounds.min >= bounds.max) {
    throw new ValidationError(`min_${name} must be less than max_${name}`, bounds);
  }
}

export type SummaryFilterInput = {
  entityId: string;
  queryType: string;
  minIngestedAt?: number;
  maxIngestedAt?: number;
  minBlock?: number;
  maxBlock?: number;
  searchTagsFromProcess?: string;
};

export function createSummaryFilter(input: SummaryFilterInput): SummaryFilter {
  if (!input.entityId) throw new ValidationError("entityId is required");
  if (!isSummaryQueryType(input.queryType)) {
    throw new ValidationError(`Unsupported query_type: ${input.queryType}`);
  }

  const ingestedAt: Bounds = { min: input.minIngestedAt, max: input.maxIngestedAt };
  const block: Bounds = { min: input.minBlock, max: input.maxBlock };
  validateBounds("ingested_at", ingestedAt);
  validateBounds("block", block);

  if (input.queryType === "token_transfers_from_process" && !input.searchTagsFromProcess) {
    throw new ValidationError("token_transfers_from_process needs searchTagsFromProcess");
  }

  return {
    kind: "summary",
    entityId: input.entityId,
    queryType: input.queryType,
    ingestedAt,
    block,
    ...(input.searchTagsFromProcess ? { searchTagsFromProcess: input.searchTagsFromProcess } : {}),
  };
}

export function createDetailsFilter(
  messageId: string,
  fromProcessId: string,
  queryType: string = "resulting"
): DetailsFilter {
  if (!messageId || !fromProcessId) {
    throw new ValidationError("messageId and fromProcessId are required");
  }
  if (!isDetailsQueryType(queryType)) {
    throw new ValidationError(`Unsupported query_type: ${queryType}`);
  }
  return { kind: "details", messageId, fromProcessId, queryType };
}

// ==================== Query Text ====================

export type GraphqlPayload = {
  query: string;
  variables: Record<string, string | number>;
};

function rangeClause(field: string, bounds: Bounds): string | null {
  const parts: string[] = [];
  if (bounds.min !== undefined) parts.push(`min: ${bounds.min}`);
  if (bounds.max !== undefined) parts.push(`max: ${bounds.max}`);
  return parts.length ? `${field}: {${parts.join(", ")}}` : null;
}

function renderQuery(declarations: string[], filters: string, wantCount: boolean): string {
  return `
query (${declarations.join(", ")}) {
  transactions(
    sort: $sortOrder
    first: $limit
    after: $cursor
    ${filters}
  ) {
    ${wantCount ? "count" : ""}
    edges {
      cursor
      node {${NODE_FIELDS}
      }
    }
  }
}`;
}

function summaryPayload(
  filter: SummaryFilter,
  cursor: string,
  limit: number,
  wantCount: boolean
): GraphqlPayload {
  const template = SUMMARY_CONDITIONS[filter.queryType];
  const ingestedAt: Bounds = {
    ...filter.ingestedAt,
    min: filter.ingestedAt.min ?? template.ingestedFloor,
  };

  const filters = [
    template.condition,
    rangeClause("ingested_at", ingestedAt),
    rangeClause("block", filter.block),
  ].filter((clause): clause is string => clause !== null);

  const declarations = [
    "$entityId: String!",
    "$limit: Int!",
    "$sortOrder: SortOrder!",
    "$cursor: String",
  ];
  const variables: Record<string, string | number> = {
    entityId: filter.entityId,
    limit,
    sortOrder: SORT_ORDER,
    cursor,
  };

  if (template.condition.includes("$fromProcessId")) {
    declarations.push("$fromProcessId: String!");
    variables.fromProcessId = filter.searchTagsFromProcess ?? "";
  }

  return { query: renderQuery(declarations, filters.join(", "), wantCount), variables };
}

function detailsPayload(
  filter: DetailsFilter,
  cursor: string,
  limit: number,
  wantCount: boolean
): GraphqlPayload {
  const filters = `${DETAILS_CONDITION}, ${rangeClause("ingested_at", { min: AO_INGEST_FLOOR })}`;
  const declarations = [
    "$fromProcessId: String!",
    "$messageId: String!",
    "$limit: Int!",
    "$sortOrder: SortOrder!",
    "$cursor: String",
  ];
  return {
    query: renderQuery(declarations, filters, wantCount),
    variables: {
      fromProcessId: filter.fromProcessId,
      messageId: filter.messageId,
      limit,
      sortOrder: SORT_ORDER,
      cursor,
    },
  };
}

/**
 * GraphQL request body for one page of `filter`.
 */
export function buildTransactionsQuery(
  filter: TransactionFilter,
  cursor: string,
  limit: number,
  wantCount: boolean
): GraphqlPayload {
  return filter.kind === "summary"
    ? summaryPayload(filter, cursor, limit, wantCount)
    : detailsPayload(filter, cursor, limit, wantCount);
}

/** Short label for log lines. */
export function describeFilter(filter: TransactionFilter): string {
  return filter.kind === "summary"
    ? `${filter.queryType}(${filter.entityId})`
    : `${filter.queryType}(${filter.messageId} <- ${filter.fromProcessId})`;
}
