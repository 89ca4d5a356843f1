import { existsSync, mkdtempSync, rmSync } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ArweaveClient } from "../client";
import { log } from "../logger";
import { runEventReport, runWorldReport } from "../reports";
import { parseUtc } from "../time";
import type { PageOutcome, PageRequest, PageSource, TransactionEdge } from "../types";
import { edge } from "./helpers";

/** Serves one page per query type from the first cursor, then nothing. */
class QueryTypeSource implements PageSource {
  readonly requests: PageRequest[] = [];

  constructor(private readonly pages: Record<string, TransactionEdge[]>) {}

  async fetchPage(request: PageRequest): Promise<PageOutcome> {
    this.requests.push(request);
    const edges = this.pages[request.filter.queryType] ?? [];
    if (request.wantCount) {
      return { status: "ok", page: { edges: [], totalCount: edges.length }, attempts: 1 };
    }
    return { status: "ok", page: { edges: request.cursor === "" ? edges : [] }, attempts: 1 };
  }
}

/** Serves one entity-create record named after the window's lower bound. */
class WindowSource implements PageSource {
  async fetchPage(request: PageRequest): Promise<PageOutcome> {
    const filter = request.filter;
    const edges =
      filter.kind === "summary" &&
      filter.queryType === "received_action_entityCreate" &&
      request.cursor === ""
        ? [edge(`create-${filter.ingestedAt.min ?? 0}`, `c-${filter.ingestedAt.min ?? 0}`)]
        : [];
    if (request.wantCount) {
      return { status: "ok", page: { edges: [], totalCount: edges.length }, attempts: 1 };
    }
    return { status: "ok", page: { edges }, attempts: 1 };
  }
}

const window = { start: parseUtc("2024-12-19 01:00:00"), end: parseUtc("2024-12-19 03:00:00") };

describe("reports", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "reports-"));
    log.setLevel("error");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    log.setLevel("info");
  });

  const client = (source: PageSource) =>
    new ArweaveClient({ batchSleepMs: 0, retryDelayMs: 0 }, { source });

  it("counts tickets and catches inside the window", async () => {
    const source = new QueryTypeSource({
      token_transfers_from_process: [
        edge("t1", "c1", { tags: [{ name: "Quantity", value: "5000000000000" }] }),
        edge("t2", "c2", { tags: [{ name: "Quantity", value: "10000000000000" }] }),
      ],
      sent_action_catch: [
        edge("k1", "c3", { tags: [{ name: "Catch", value: "4" }] }),
        edge("k2", "c4", { tags: [{ name: "Catch", value: "4" }] }),
      ],
    });

    const report = await runEventReport(client(source), {
      entityId: "entity-1",
      ticketProcessId: "ticket-proc",
      window,
      outDir: dir,
      csv: true,
    });

    expect(report.ticketSales.tickets).toBe(3);
    expect(report.ticketTimeline).toEqual([
      { ingested_at: 1734572396, tickets: 1 },
      { ingested_at: 1734572396, tickets: 3 },
    ]);
    expect(existsSync(path.join(dir, "ticket_sales_timeline.json"))).toBe(true);
    expect(report.catchCounts.byType.Legendary).toBe(2);

    const transferRequest = source.requests[0];
    expect(transferRequest.filter).toMatchObject({
      queryType: "token_transfers_from_process",
      searchTagsFromProcess: "ticket-proc",
      ingestedAt: { min: 1734570000, max: 1734577200 },
    });
    for (const name of ["token_transfers_res", "catch_res"]) {
      expect(existsSync(path.join(dir, `${name}.json`))).toBe(true);
      expect(existsSync(path.join(dir, `${name}.csv`))).toBe(true);
    }
  });

  it("summarises world traffic", async () => {
    const source = new QueryTypeSource({
      received_action_entityCreate: [edge("e1", "c1")],
      received: [
        edge("r1", "c2", { owner: "wallet-1", tags: [{ name: "Action", value: "ChatMessage" }] }),
        edge("r2", "c3", {
          owner: "process-1",
          tags: [{ name: "From-Process", value: "process-1" }],
        }),
        edge("r3", "c4", { owner: "wallet-2" }),
      ],
    });

    const report = await runWorldReport(client(source), {
      entityId: "entity-1",
      window,
      outDir: dir,
    });

    expect(report.entityCreate.map((e) => e.node.id)).toEqual(["e1"]);
    expect(report.entityUpdatePosition).toEqual([]);
    expect(report.uniqueUsers).toEqual(["wallet-1", "wallet-2"]);
    expect(report.chatMessages.map((e) => e.node.id)).toEqual(["r1"]);
    expect(existsSync(path.join(dir, "entity_create_res.json"))).toBe(true);
    expect(existsSync(path.join(dir, "received_res.csv"))).toBe(false);
  });

  it("keeps entity-create checkpoints of different windows apart", async () => {
    const source = new WindowSource();
    const nextDay = {
      start: parseUtc("2024-12-20 01:00:00"),
      end: parseUtc("2024-12-20 03:00:00"),
    };

    const first = await runWorldReport(client(source), {
      entityId: "entity-1",
      window,
      outDir: dir,
    });
    const second = await runWorldReport(client(source), {
      entityId: "entity-1",
      window: nextDay,
      outDir: dir,
    });

    expect(first.entityCreate.map((e) => e.node.id)).toEqual(["create-1734570000"]);
    expect(second.entityCreate.map((e) => e.node.id)).toEqual(["create-1734656400"]);
    const checkpoint = "received_action_entityCreate_entity-1_1734570000_1734577200.checkpoint.json";
    expect(existsSync(path.join(dir, checkpoint))).toBe(true);
  });

  it("writes nothing without an output directory", async () => {
    const source = new QueryTypeSource({});

    const report = await runWorldReport(client(source), { entityId: "entity-1", window });

    expect(report.received).toEqual([]);
  });
});
