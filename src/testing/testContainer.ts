// src/testing/testContainer.ts
// Builds a MOCK-mode container on a manual clock with recording collaborators.

import { loadConfig, type AppConfig } from "@/config/app.config";
import { ManualClock } from "@/lib/clock";
import { InMemoryCustomerDirectory } from "@/lib/collaborators/customer-directory";
import { InMemoryProductCatalog } from "@/lib/collaborators/product-catalog";
import { InMemoryValidationCache } from "@/lib/collaborators/validation-cache";
import { MemoryWarrantyStore } from "@/lib/store/memory.store";
import type { NewBarcode, WarrantyBarcode } from "@/modules/barcodes/barcode.types";
import { createContainer, type Container, type ContainerOverrides } from "@/container";
import { newId } from "@/utils/uuid";
import { RecordingNotificationSink, FixedVerdictScanner } from "./fakes";
import {
  OTHER_CUSTOMER,
  TEST_CUSTOMER,
  TEST_INTERNAL_KEY,
  TEST_JWT_SECRET,
  TEST_PRODUCT,
  TEST_STOREFRONT_ID,
} from "./fixtures";

export const TEST_ENV: Record<string, string> = {
  MODE: "MOCK",
  JWT_SECRET: TEST_JWT_SECRET,
  INTERNAL_API_KEY: TEST_INTERNAL_KEY,
  BATCH_CHUNK_SIZE: "10",
  BATCH_WORKER_COUNT: "2",
  BATCH_DEFAULT_MAX_RETRIES: "3",
  BATCH_RETRY_BACKOFF_MS: "0",
  PUBLIC_CACHE_TTL_SECONDS: "60",
};

export type TestHarness = {
  container: Container;
  config: AppConfig;
  clock: ManualClock;
  store: MemoryWarrantyStore;
  notifications: RecordingNotificationSink;
  products: InMemoryProductCatalog;
  customers: InMemoryCustomerDirectory;
  /** Inserts a generated barcode directly, bypassing batches. */
  seedBarcode(barcode: string, warrantyPeriodMonths?: number): Promise<WarrantyBarcode>;
};

export function buildTestContainer(
  opts: {
    now?: string;
    env?: Record<string, string>;
    store?: MemoryWarrantyStore;
    overrides?: ContainerOverrides;
  } = {},
): TestHarness {
  const config = loadConfig({ ...TEST_ENV, ...opts.env });
  const clock = new ManualClock(opts.now ?? "2024-01-10T10:00:00.000Z");
  const store = opts.store ?? new MemoryWarrantyStore();
  const notifications = new RecordingNotificationSink();
  const products = new InMemoryProductCatalog([TEST_PRODUCT]);
  const customers = new InMemoryCustomerDirectory([TEST_CUSTOMER, OTHER_CUSTOMER]);

  const container = createContainer(config, {
    clock,
    store,
    notifications,
    products,
    customers,
    cache: new InMemoryValidationCache(clock),
    cacheTtlSeconds: config.publicApi.cacheTtlSeconds,
    scanner: new FixedVerdictScanner({ status: "passed", detail: null }),
    ...opts.overrides,
  });

  return {
    container,
    config,
    clock,
    store,
    notifications,
    products,
    customers,
    async seedBarcode(barcode, warrantyPeriodMonths = 24) {
      const row: NewBarcode = {
        id: newId(),
        barcode,
        productId: TEST_PRODUCT.id,
        storefrontId: TEST_STOREFRONT_ID,
        batchId: null,
        warrantyPeriodMonths,
        createdAt: clock.now(),
      };
      return store.transaction((tx) => tx.barcodes.insert(row));
    },
  };
}
