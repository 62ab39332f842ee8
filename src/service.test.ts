import { describe, expect, it } from "vitest";
import { createService } from "./service.js";

describe("createService", () => {
  it("wires the reference jobs without starting them", async () => {
    const service = createService(":memory:");
    const status = service.queries.getServiceStatus();
    expect(status.scheduler.running).toBe(false);
    expect(status.scheduler.jobs.map((j) => j.id)).toEqual([
      "update_indices",
      "update_premium",
      "update_fund_flow",
      "update_predictions",
    ]);
    expect(service.queries.listRecentEvents().total).toBe(0);
    await service.shutdown();
    await expect(service.shutdown()).resolves.toBeUndefined();
  });
});
