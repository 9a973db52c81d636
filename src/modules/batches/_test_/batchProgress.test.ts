// src/modules/batches/_test_/batchProgress.test.ts

import { describe, expect, it } from "vitest";
import { buildTestContainer } from "@/testing/testContainer";
import { adminActor, agentActor, TEST_PRODUCT, TEST_STOREFRONT_ID } from "@/testing/fixtures";
import { GenerationRateWindow } from "../batchProgress";

const T0 = new Date("2024-03-01T09:00:00.000Z");

function at(ms: number) {
  return new Date(T0.getTime() + ms);
}

describe("GenerationRateWindow", () => {
  it("should report 0 before any chunk is committed", () => {
    const window = new GenerationRateWindow();
    expect(window.rate()).toBe(0);

    window.record(T0, 0);
    expect(window.rate()).toBe(0);
  });

  it("should report 0 when commits span no measurable time", () => {
    const window = new GenerationRateWindow();
    window.record(T0, 0);
    window.record(T0, 250);

    expect(window.rate()).toBe(0);
  });

  it("should average items per second across the window", () => {
    const window = new GenerationRateWindow();
    window.record(T0, 0);
    window.record(at(2_000), 250);
    expect(window.rate()).toBe(125);

    window.record(at(3_000), 250);
    expect(window.rate()).toBe(83.33);
  });

  it("should forget samples that slide out of the window", () => {
    const window = new GenerationRateWindow(2);
    window.record(T0, 0);
    window.record(at(1_000), 1_000);
    window.record(at(3_000), 1_100);

    expect(window.rate()).toBe(50);
  });
});

describe("batch progress snapshot", () => {
  it("should show a zero rate and no estimate for a batch that has not generated", async () => {
    const h = buildTestContainer({ now: T0.toISOString() });
    const batch = await h.container.batches.create(adminActor, {
      productId: TEST_PRODUCT.id,
      storefrontId: TEST_STOREFRONT_ID,
      quantity: 50,
      prefix: "WB",
      expiryMonths: 12,
      priority: "normal",
    });

    const progress = await h.container.batches.progress(agentActor, batch.id);
    expect(progress).toMatchObject({
      progress: 0,
      processed: 0,
      remaining: 50,
      generationRate: 0,
      estimatedCompletion: null,
    });
  });
});
