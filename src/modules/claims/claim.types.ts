// src/modules/claims/claim.types.ts
// Canonical claim shapes. Views for customers and agents are projected from these.

export const ClaimStatus = {
  PENDING: "pending",
  VALIDATED: "validated",
  REJECTED: "rejected",
  ASSIGNED: "assigned",
  IN_REPAIR: "in_repair",
  REPAIRED: "repaired",
  REPLACED: "replaced",
  SHIPPED: "shipped",
  DELIVERED: "delivered",
  COMPLETED: "completed",
  CANCELLED: "cancelled",
  DISPUTED: "disputed",
} as const;

export type ClaimStatus = (typeof ClaimStatus)[keyof typeof ClaimStatus];

export const ClaimAction = {
  VALIDATE: "validate",
  REJECT: "reject",
  CANCEL: "cancel",
  ASSIGN: "assign",
  START: "start",
  REPAIR: "repair",
  REPLACE: "replace",
  SHIP: "ship",
  DELIVER: "deliver",
  COMPLETE: "complete",
  DISPUTE: "dispute",
  RESOLVE: "resolve",
} as const;

export type ClaimAction = (typeof ClaimAction)[keyof typeof ClaimAction];

export const IssueCategory = {
  HARDWARE: "hardware",
  SOFTWARE: "software",
  PERFORMANCE: "performance",
  DEFECT: "defect",
  MALFUNCTION: "malfunction",
  DAMAGE: "damage",
  OTHER: "other",
} as const;

export type IssueCategory = (typeof IssueCategory)[keyof typeof IssueCategory];

export const Severity = {
  LOW: "low",
  MEDIUM: "medium",
  HIGH: "high",
  CRITICAL: "critical",
} as const;

export type Severity = (typeof Severity)[keyof typeof Severity];

export const ClaimPriority = {
  LOW: "low",
  NORMAL: "normal",
  HIGH: "high",
  URGENT: "urgent",
} as const;

export type ClaimPriority = (typeof ClaimPriority)[keyof typeof ClaimPriority];

export const ResolutionType = {
  REPAIR: "repair",
  REPLACE: "replace",
  REFUND: "refund",
} as const;

export type ResolutionType =
  (typeof ResolutionType)[keyof typeof ResolutionType];

export type ContactSnapshot = {
  name: string;
  email: string;
  phone: string | null;
  pickupAddress: string | null;
};

export type ClaimCosts = {
  repairCost: number;
  shippingCost: number;
  replacementCost: number;
  totalCost: number;
};

export type Claim = ClaimCosts & {
  id: string;
  claimNumber: string;
  barcodeId: string;
  barcode: string;
  customerId: string;
  productId: string;
  storefrontId: string | null;
  issueCategory: IssueCategory;
  issueDescription: string;
  issueDate: string;
  severity: Severity;
  priority: ClaimPriority;
  status: ClaimStatus;
  previousStatus: ClaimStatus | null;
  statusUpdatedAt: Date;
  statusUpdatedBy: string;
  claimDate: Date;
  validatedAt: Date | null;
  validatedBy: string | null;
  completedAt: Date | null;
  estimatedCompletionDate: Date | null;
  actualCompletionDate: Date | null;
  resolutionType: ResolutionType | null;
  resolutionNotes: string | null;
  contact: ContactSnapshot;
  customerNotes: string | null;
  adminNotes: string | null;
  repairNotes: string | null;
  rejectionReason: string | null;
  assignedTechnicianId: string | null;
  replacementProductId: string | null;
  shippingProvider: string | null;
  trackingNumber: string | null;
  satisfactionRating: number | null;
  customerFeedback: string | null;
  tags: string[];
  version: number;
  createdAt: Date;
  updatedAt: Date;
};

export type NewClaim = Omit<Claim, "version" | "updatedAt">;

/** Fields a transition may rewrite. Identity, numbering and origin are fixed. */
export type ClaimPatch = Partial<
  Omit<
    Claim,
    | "id"
    | "claimNumber"
    | "barcodeId"
    | "barcode"
    | "customerId"
    | "productId"
    | "claimDate"
    | "createdAt"
    | "version"
  >
>;

export type ClaimFilter = {
  status?: ClaimStatus;
  priority?: ClaimPriority;
  severity?: Severity;
  storefrontId?: string;
  technicianId?: string;
  customerId?: string;
  claimDateFrom?: Date;
  claimDateTo?: Date;
};
