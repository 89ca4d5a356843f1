import type {
  PageOutcome,
  PageRequest,
  PageSource,
  RetryPolicy,
  Tag,
  TransactionEdge,
} from "../types";

export function edge(
  id: string,
  cursor: string,
  options: { height?: number | null; tags?: Tag[]; owner?: string } = {}
): TransactionEdge {
  const height = options.height === undefined ? 100 : options.height;
  return {
    cursor,
    node: {
      id,
      recipient: "entity-1",
      ingested_at: 1734572396,
      block: height === null ? null : { timestamp: 1734570863, height },
      tags: options.tags ?? [],
      data: { size: "1" },
      owner: options.owner === undefined ? null : { address: options.owner },
    },
  };
}

type Step =
  | { edges: TransactionEdge[]; totalCount?: number }
  | { fail: true };

/**
 * In-process page source. Pages are looked up by request cursor; the count
 * request (wantCount) is answered from `totalCount`.
 */
export class ScriptedPageSource implements PageSource {
  readonly calls: Array<{ request: PageRequest; policy?: RetryPolicy }> = [];

  constructor(
    private readonly pages: Record<string, Step>,
    private readonly totalCount: number | null = 0
  ) {}

  async fetchPage(request: PageRequest, policy?: RetryPolicy): Promise<PageOutcome> {
    this.calls.push({ request, ...(policy ? { policy } : {}) });

    if (request.wantCount) {
      if (this.totalCount === null) {
        return {
          status: "exhausted",
          cursor: request.cursor,
          error: new Error("down"),
          attempts: 1,
        };
      }
      return { status: "ok", page: { edges: [], totalCount: this.totalCount }, attempts: 1 };
    }

    const step = this.pages[request.cursor] ?? { edges: [] };
    if ("fail" in step) {
      return { status: "exhausted", cursor: request.cursor, error: new Error("down"), attempts: 1 };
    }
    return { status: "ok", page: { edges: step.edges }, attempts: 1 };
  }

  /** Cursors of the paging requests, count request excluded. */
  pageCursors(): string[] {
    return this.calls.filter((call) => !call.request.wantCount).map((call) => call.request.cursor);
  }
}
