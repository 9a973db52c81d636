// src/modules/batches/batch.types.ts

export const BatchStatus = {
  PENDING: "pending",
  IN_PROGRESS: "in_progress",
  COMPLETED: "completed",
  CANCELLED: "cancelled",
  FAILED: "failed",
} as const;

export type BatchStatus = (typeof BatchStatus)[keyof typeof BatchStatus];

export const BatchPriority = {
  LOW: "low",
  NORMAL: "normal",
  HIGH: "high",
  URGENT: "urgent",
} as const;

export type BatchPriority = (typeof BatchPriority)[keyof typeof BatchPriority];

export const BatchStep = {
  QUEUED: "queued",
  GENERATING: "generating",
  COMMITTING: "committing",
  FINALIZING: "finalizing",
  DONE: "done",
} as const;

export type BatchStep = (typeof BatchStep)[keyof typeof BatchStep];

export type Batch = {
  id: string;
  batchNumber: string;
  productId: string;
  storefrontId: string;
  requestedQuantity: number;
  generatedCount: number;
  successfulCount: number;
  failedCount: number;
  errorCount: number;
  collisionCount: number;
  retryCount: number;
  maxRetries: number;
  prefix: string;
  description: string | null;
  expiryMonths: number;
  priority: BatchPriority;
  status: BatchStatus;
  currentStep: BatchStep;
  tags: string[];
  notes: string | null;
  notifyOnComplete: boolean;
  generationRate: number | null;
  lastError: string | null;
  lastUpdatedAt: Date;
  createdBy: string;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  cancelledAt: Date | null;
  cancelledBy: string | null;
  cancellationReason: string | null;
};

export type NewBatch = Omit<
  Batch,
  | "generatedCount"
  | "successfulCount"
  | "failedCount"
  | "errorCount"
  | "collisionCount"
  | "retryCount"
  | "status"
  | "currentStep"
  | "generationRate"
  | "lastError"
  | "startedAt"
  | "completedAt"
  | "cancelledAt"
  | "cancelledBy"
  | "cancellationReason"
>;

/** Counter increments applied atomically by one chunk commit. */
export type BatchChunkDelta = {
  generated: number;
  successful: number;
  failed: number;
  errors: number;
  collisions: number;
  retries: number;
  lastError?: string | null;
  generationRate: number | null;
  currentStep: BatchStep;
  at: Date;
};

export const CollisionType = {
  DUPLICATE_IN_BATCH: "duplicate_in_batch",
  DUPLICATE_IN_STORE: "duplicate_in_store",
} as const;

export type CollisionType = (typeof CollisionType)[keyof typeof CollisionType];

export const CollisionResolution = {
  REGENERATED: "regenerated",
  DROPPED: "dropped",
} as const;

export type CollisionResolution =
  (typeof CollisionResolution)[keyof typeof CollisionResolution];

export type CollisionRecord = {
  id: string;
  batchId: string;
  slot: number;
  candidate: string;
  collisionType: CollisionType;
  resolution: CollisionResolution;
  detectedAt: Date;
  resolvedAt: Date | null;
};

export type SecurityScore = "EXCELLENT" | "GOOD" | "POOR";
export type RecommendedAction = "continue" | "monitor" | "review_algorithm";

export type BatchStatistics = {
  collisionRate: number;
  successRate: number;
  securityScore: SecurityScore;
  recommendedAction: RecommendedAction;
};

export type BatchProgressSnapshot = {
  batchId: string;
  batchNumber: string;
  status: BatchStatus;
  progress: number;
  currentStep: BatchStep;
  requested: number;
  processed: number;
  remaining: number;
  successful: number;
  failed: number;
  errorCount: number;
  collisionCount: number;
  retryCount: number;
  generationRate: number;
  lastUpdated: Date;
  estimatedCompletion: Date | null;
  lastError: string | null;
  statistics: BatchStatistics;
};

export type BatchFilter = {
  status?: BatchStatus;
  priority?: BatchPriority;
  productId?: string;
  storefrontId?: string;
  createdBy?: string;
  createdFrom?: Date;
  createdTo?: Date;
};

export type CollisionFilter = {
  collisionType?: CollisionType;
};
