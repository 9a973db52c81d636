// src/container.ts
// Purpose: Composition root. MODE picks the store, cache and collaborators;
// tests pass overrides for the clock, fakes and deterministic generators.

import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import type { AppConfig } from "@/config/app.config";
import { systemClock, type Clock } from "@/lib/clock";
import { closePool, getPool } from "@/lib/db";
import { createRedisClient } from "@/lib/redis";
import { MemoryWarrantyStore } from "@/lib/store/memory.store";
import { PostgresWarrantyStore } from "@/lib/store/postgres.store";
import type { WarrantyStore } from "@/lib/store/store.types";
import {
  HttpAttachmentScanner,
  PassThroughAttachmentScanner,
  type AttachmentScanner,
} from "@/lib/collaborators/attachment-scanner";
import {
  InMemoryCustomerDirectory,
  PostgresCustomerDirectory,
  type CustomerDirectory,
} from "@/lib/collaborators/customer-directory";
import {
  LoggingNotificationSink,
  WebhookNotificationSink,
  type NotificationSink,
} from "@/lib/collaborators/notification-sink";
import {
  InMemoryProductCatalog,
  PostgresProductCatalog,
  type ProductCatalog,
} from "@/lib/collaborators/product-catalog";
import {
  InMemoryValidationCache,
  RedisValidationCache,
  type ValidationCache,
} from "@/lib/collaborators/validation-cache";
import { errorMeta, log } from "@/lib/observability/logger";
import { AttachmentService } from "@/modules/attachments/attachment.service";
import { BarcodeService } from "@/modules/barcodes/barcode.service";
import { BatchService } from "@/modules/batches/batch.service";
import { BatchRunner, type CandidateSourceFactory } from "@/modules/batches/batchRunner";
import { ClaimService } from "@/modules/claims/claim.service";
import { DefaultCoveragePolicy, type CoveragePolicy } from "@/modules/public/coverage.policy";
import { PublicWarrantyService } from "@/modules/public/publicWarranty.service";
import { RepairTicketService } from "@/modules/repairs/repairTicket.service";
import { TimelineService } from "@/modules/timeline/timeline.service";

export type Infrastructure = {
  clock: Clock;
  store: WarrantyStore;
  cache: ValidationCache;
  cacheTtlSeconds: number;
  products: ProductCatalog;
  customers: CustomerDirectory;
  notifications: NotificationSink;
  scanner: AttachmentScanner;
  coverage: CoveragePolicy;
  candidateSourceFor?: CandidateSourceFactory;
};

export type Container = Infrastructure & {
  config: AppConfig;
  runner: BatchRunner;
  batches: BatchService;
  barcodes: BarcodeService;
  claims: ClaimService;
  repairs: RepairTicketService;
  attachments: AttachmentService;
  timeline: TimelineService;
  publicWarranty: PublicWarrantyService;
  /** Stops background work, then releases connections. */
  close(): Promise<void>;
};

export type ContainerOverrides = Partial<Infrastructure>;

////////////////////////////////////////////////////////////////
// MOCK fixtures
////////////////////////////////////////////////////////////////

const MockFixturesSchema = z.object({
  products: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      sku: z.string(),
      brand: z.string().nullable(),
      category: z.string().nullable(),
      description: z.string().nullable(),
      basePrice: z.number().nullable(),
      imageUrl: z.string().nullable(),
    }),
  ),
  customers: z.array(
    z.object({
      id: z.string(),
      email: z.string(),
      name: z.string(),
      phone: z.string().nullable(),
    }),
  ),
});

const MOCK_FIXTURES_PATH = "db/fixtures/mock-catalog.json";

function loadMockFixtures() {
  const path = resolve(process.cwd(), MOCK_FIXTURES_PATH);
  try {
    return MockFixturesSchema.parse(JSON.parse(readFileSync(path, "utf8")));
  } catch (err) {
    log("WARN", "MOCK_FIXTURES_UNAVAILABLE", { path, ...errorMeta(err) });
    return { products: [], customers: [] };
  }
}

////////////////////////////////////////////////////////////////
// Infrastructure
////////////////////////////////////////////////////////////////

function mockInfrastructure(config: AppConfig, clock: Clock): Infrastructure & {
  release: () => Promise<void>;
} {
  const fixtures = loadMockFixtures();
  const store = new MemoryWarrantyStore();

  return {
    clock,
    store,
    cache: new InMemoryValidationCache(clock),
    cacheTtlSeconds: config.publicApi.cacheTtlSeconds,
    products: new InMemoryProductCatalog(fixtures.products),
    customers: new InMemoryCustomerDirectory(fixtures.customers),
    notifications: new LoggingNotificationSink(),
    scanner: new PassThroughAttachmentScanner(),
    coverage: new DefaultCoveragePolicy(),
    release: () => store.close(),
  };
}

function liveInfrastructure(config: AppConfig, clock: Clock): Infrastructure & {
  release: () => Promise<void>;
} {
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when MODE=LIVE");
  }

  const pool = getPool(config.databaseUrl);
  const redis = config.redisUrl ? createRedisClient(config.redisUrl) : null;
  const { notificationWebhookUrl, scannerUrl } = config.collaborators;

  return {
    clock,
    store: new PostgresWarrantyStore(pool),
    // without Redis the cache is disabled: a zero TTL never stores
    cache: redis ? new RedisValidationCache(redis) : new InMemoryValidationCache(clock),
    cacheTtlSeconds: redis ? config.publicApi.cacheTtlSeconds : 0,
    products: new PostgresProductCatalog(pool),
    customers: new PostgresCustomerDirectory(pool),
    notifications: notificationWebhookUrl
      ? new WebhookNotificationSink(notificationWebhookUrl)
      : new LoggingNotificationSink(),
    scanner: scannerUrl ? new HttpAttachmentScanner(scannerUrl) : new PassThroughAttachmentScanner(),
    coverage: new DefaultCoveragePolicy(),
    release: async () => {
      if (redis) await redis.quit();
      await closePool();
    },
  };
}

////////////////////////////////////////////////////////////////
// Services
////////////////////////////////////////////////////////////////

export function createContainer(
  config: AppConfig,
  overrides: ContainerOverrides = {},
): Container {
  const clock = overrides.clock ?? systemClock;
  const base =
    config.mode === "LIVE" ? liveInfrastructure(config, clock) : mockInfrastructure(config, clock);
  const { release, ...defaults } = base;
  const infra: Infrastructure = { ...defaults, ...overrides, clock };

  const runner = new BatchRunner({
    store: infra.store,
    clock,
    config: config.batch,
    notifications: infra.notifications,
    candidateSourceFor: infra.candidateSourceFor,
  });

  const timeline = new TimelineService(infra.store.timeline);

  const attachments = new AttachmentService({
    store: infra.store,
    clock,
    config: config.attachments,
    scanner: infra.scanner,
  });

  const repairs = new RepairTicketService({
    store: infra.store,
    clock,
    notifications: infra.notifications,
    approvalCostThreshold: config.repairs.customerApprovalCostThreshold,
  });

  const claims = new ClaimService({
    store: infra.store,
    clock,
    customers: infra.customers,
    notifications: infra.notifications,
    cache: infra.cache,
    attachments,
    repairs,
    timeline,
  });

  return {
    ...infra,
    config,
    runner,
    timeline,
    attachments,
    repairs,
    claims,
    batches: new BatchService({
      store: infra.store,
      clock,
      config: config.batch,
      products: infra.products,
      runner,
    }),
    barcodes: new BarcodeService({ store: infra.store, clock, cache: infra.cache }),
    publicWarranty: new PublicWarrantyService({
      store: infra.store,
      clock,
      products: infra.products,
      customers: infra.customers,
      cache: infra.cache,
      cacheTtlSeconds: infra.cacheTtlSeconds,
      coverage: infra.coverage,
    }),
    async close() {
      await runner.shutdown();
      await attachments.drainScans();
      // an overridden store belongs to the caller
      if (overrides.store) return;
      await release();
    },
  };
}
