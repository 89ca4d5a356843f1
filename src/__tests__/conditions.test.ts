import { describe, expect, it } from "vitest";

import { ValidationError } from "../errors";
import {
  AO_INGEST_FLOOR,
  buildTransactionsQuery,
  createDetailsFilter,
  createSummaryFilter,
  describeFilter,
  isSummaryQueryType,
} from "../query/conditions";
import { SUMMARY_QUERY_TYPES } from "../types";

describe("createSummaryFilter", () => {
  it("accepts every known query type", () => {
    for (const queryType of SUMMARY_QUERY_TYPES) {
      const filter = createSummaryFilter({
        entityId: "entity-1",
        queryType,
        searchTagsFromProcess: "proc-1",
      });
      expect(filter.queryType).toBe(queryType);
    }
  });

  it("rejects an unknown query type", () => {
    expect(() => createSummaryFilter({ entityId: "entity-1", queryType: "bogus" })).toThrow(
      "Unsupported query_type: bogus"
    );
    expect(isSummaryQueryType("bogus")).toBe(false);
  });

  it("rejects an inverted or empty ingested_at range", () => {
    const input = {
      entityId: "entity-1",
      queryType: "received",
      minIngestedAt: 2000,
      maxIngestedAt: 1000,
    };
    expect(() => createSummaryFilter(input)).toThrow(
      "min_ingested_at must be less than max_ingested_at"
    );
    expect(() => createSummaryFilter({ ...input, maxIngestedAt: 2000 })).toThrow(ValidationError);
  });

  it("rejects negative or fractional bounds", () => {
    const received = { entityId: "entity-1", queryType: "received" };
    expect(() => createSummaryFilter({ ...received, minBlock: -1 })).toThrow(
      "block.min must be a non-negative integer"
    );
    expect(() => createSummaryFilter({ ...received, maxBlock: 1.5 })).toThrow(ValidationError);
  });

  it("requires an entity id", () => {
    expect(() => createSummaryFilter({ entityId: "", queryType: "received" })).toThrow(
      "entityId is required"
    );
  });

  it("requires the sending process for token_transfers_from_process", () => {
    const input = { entityId: "entity-1", queryType: "token_transfers_from_process" };
    expect(() => createSummaryFilter(input)).toThrow(ValidationError);
  });
});

describe("buildTransactionsQuery", () => {
  it("renders a received query with both range clauses", () => {
    const filter = createSummaryFilter({
      entityId: "entity-1",
      queryType: "received",
      minIngestedAt: 1000,
      maxIngestedAt: 2000,
      minBlock: 5,
    });

    const { query, variables } = buildTransactionsQuery(filter, "c7", 250, false);

    expect(query).toContain(
      "recipients: [$entityId], ingested_at: {min: 1000, max: 2000}, block: {min: 5}"
    );
    expect(query).toContain("sort: $sortOrder");
    expect(query).not.toContain("count");
    expect(variables).toEqual({
      entityId: "entity-1",
      limit: 250,
      sortOrder: "INGESTED_AT_DESC",
      cursor: "c7",
    });
  });

  it("asks for the count only when wanted", () => {
    const filter = createSummaryFilter({ entityId: "entity-1", queryType: "sent" });

    expect(buildTransactionsQuery(filter, "", 1, true).query).toMatch(/\n\s+count\n/);
    expect(buildTransactionsQuery(filter, "", 1, true).query).toContain("owners: [$entityId]");
  });

  it("omits range clauses when no bounds are given", () => {
    const filter = createSummaryFilter({ entityId: "entity-1", queryType: "credit" });

    const { query } = buildTransactionsQuery(filter, "", 10, false);

    expect(query).not.toContain("ingested_at: {");
    expect(query).not.toContain("block: {");
  });

  it("applies the ingest floor to token_transfers unless a lower bound is given", () => {
    const transfers = { entityId: "entity-1", queryType: "token_transfers" };
    const open = createSummaryFilter({ ...transfers, maxIngestedAt: 1734600000 });
    const bounded = createSummaryFilter({ ...transfers, minIngestedAt: 1734500000 });

    expect(buildTransactionsQuery(open, "", 10, false).query).toContain(
      `ingested_at: {min: ${AO_INGEST_FLOOR}, max: 1734600000}`
    );
    expect(buildTransactionsQuery(bounded, "", 10, false).query).toContain(
      "ingested_at: {min: 1734500000}"
    );
  });

  it("declares and binds the sending process", () => {
    const filter = createSummaryFilter({
      entityId: "entity-1",
      queryType: "token_transfers_from_process",
      searchTagsFromProcess: "proc-1",
    });

    const { query, variables } = buildTransactionsQuery(filter, "", 10, false);

    expect(query).toContain("$fromProcessId: String!");
    expect(query).toContain('{name: "From-Process", values: [$fromProcessId]}');
    expect(variables.fromProcessId).toBe("proc-1");
  });

  it("renders the details query", () => {
    const filter = createDetailsFilter("msg-1", "proc-1");

    const { query, variables } = buildTransactionsQuery(filter, "", 100, false);

    expect(query).toContain('{name: "Pushed-For", values: [$messageId]}');
    expect(query).toContain(`ingested_at: {min: ${AO_INGEST_FLOOR}}`);
    expect(variables).toEqual({
      fromProcessId: "proc-1",
      messageId: "msg-1",
      limit: 100,
      sortOrder: "INGESTED_AT_DESC",
      cursor: "",
    });
    expect(describeFilter(filter)).toBe("resulting(msg-1 <- proc-1)");
  });
});

describe("createDetailsFilter", () => {
  it("rejects missing ids and unknown types", () => {
    expect(() => createDetailsFilter("", "proc-1")).toThrow(ValidationError);
    expect(() => createDetailsFilter("msg-1", "proc-1", "bogus")).toThrow(
      "Unsupported query_type: bogus"
    );
  });
});
