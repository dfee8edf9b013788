import { describe, expect, it } from "vitest";
import { PipelineCancelledError } from "../../errors";
import type { ProgressCursor } from "../../types/job";
import type { SearchItem } from "../../types/gateways";
import { CancellationToken } from "../../utils/cancellation";
import { StubGateway, threeItemsPerQuery } from "../../__tests__/support/fakes";
import { executeSearches, ExecuteSearchOptions, partitionBatches } from "../searchExecutor";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function baseOptions(gateway: StubGateway, overrides: Partial<ExecuteSearchOptions> = {}): ExecuteSearchOptions {
  return {
    gateway,
    concurrency: 2,
    callTimeoutMs: 200,
    resultsPerQuery: 5,
    callPauseMs: 0,
    batchPauseMs: 0,
    token: new CancellationToken(),
    ...overrides,
  };
}

describe("partitionBatches", () => {
  it("splits into consecutive batches of the given size", () => {
    expect(partitionBatches([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });
});

describe("executeSearches", () => {
  it("issues N queries in ceil(N/C) batches", async () => {
    let active = 0;
    let peak = 0;
    let batchStarts = 0;
    const gateway = new StubGateway(async (query) => {
      if (active === 0) {
        batchStarts += 1;
      }
      active += 1;
      peak = Math.max(peak, active);
      await delay(10);
      active -= 1;
      return threeItemsPerQuery(query);
    });

    const outcomes = await executeSearches(["q1", "q2", "q3", "q4", "q5"], baseOptions(gateway));

    expect(batchStarts).toBe(3);
    expect(peak).toBe(2);
    expect(gateway.calls).toEqual(["q1", "q2", "q3", "q4", "q5"]);
    expect(outcomes.map((outcome) => outcome.items.length)).toEqual([3, 3, 3, 3, 3]);
  });

  it("turns a timed-out call into an empty result without failing its siblings", async () => {
    const gateway = new StubGateway(async (query) => {
      if (query === "slow") {
        return new Promise<SearchItem[]>(() => undefined);
      }
      return threeItemsPerQuery(query);
    });

    const outcomes = await executeSearches(["slow", "fast"], baseOptions(gateway, { callTimeoutMs: 50 }));

    expect(outcomes[0]).toEqual({ query: "slow", items: [], failed: true });
    expect(outcomes[1].query).toBe("fast");
    expect(outcomes[1].items).toHaveLength(3);
    expect(outcomes[1].failed).toBe(false);
  });

  it("turns a gateway error into an empty result", async () => {
    const gateway = new StubGateway(async (query) => {
      if (query === "broken") {
        throw new Error("upstream exploded");
      }
      return threeItemsPerQuery(query);
    });

    const outcomes = await executeSearches(["broken", "fine"], baseOptions(gateway));

    expect(outcomes.map((outcome) => outcome.failed)).toEqual([true, false]);
    expect(outcomes[0].items).toEqual([]);
  });

  it("keeps outcomes in query order when calls finish out of order", async () => {
    const gateway = new StubGateway(async (query) => {
      await delay(query === "first" ? 30 : 1);
      return threeItemsPerQuery(query);
    });

    const outcomes = await executeSearches(["first", "second"], baseOptions(gateway));

    expect(outcomes.map((outcome) => outcome.query)).toEqual(["first", "second"]);
  });

  it("emits one progress tick per completed call", async () => {
    const gateway = new StubGateway(async (query) => threeItemsPerQuery(query));
    const ticks: ProgressCursor[] = [];

    await executeSearches(
      ["alpha", "beta", "gamma"],
      baseOptions(gateway, {
        progress: {
          startStep: 0,
          totalSteps: 6,
          onProgress: (cursor) => {
            ticks.push(cursor);
          },
        },
      }),
    );

    expect(ticks.map((tick) => tick.step)).toEqual([1, 2, 3]);
    expect(ticks.every((tick) => tick.totalSteps === 6)).toBe(true);
    expect(ticks.map((tick) => tick.label).sort()).toEqual([
      "Searching: alpha",
      "Searching: beta",
      "Searching: gamma",
    ]);
  });

  it("stops before the next batch once cancelled", async () => {
    const token = new CancellationToken();
    const gateway = new StubGateway(async (query) => {
      if (query === "q2") {
        token.cancel();
      }
      return threeItemsPerQuery(query);
    });

    await expect(executeSearches(["q1", "q2", "q3"], baseOptions(gateway, { token }))).rejects.toBeInstanceOf(
      PipelineCancelledError,
    );
    expect(gateway.calls).toEqual(["q1", "q2"]);
  });
});
