// src/testing/fixtures.ts
// Shared actors, catalog rows and tokens for tests.

import jwt from "jsonwebtoken";
import { ActorType, ADMIN_ROLE, type Actor } from "@/lib/auth/actor";
import type { CustomerProfile } from "@/lib/collaborators/customer-directory";
import type { ProductSummary } from "@/lib/collaborators/product-catalog";

export const TEST_JWT_SECRET = "test-secret";
export const TEST_INTERNAL_KEY = "test-internal-key";

export const TEST_STOREFRONT_ID = "store-test-01";

export const TEST_PRODUCT: ProductSummary = {
  id: "prod-test-phone",
  name: "Test Phone X",
  sku: "SKU-TEST-PHONE",
  brand: "Testbrand",
  category: "phones",
  description: "Handset used by tests",
  basePrice: 499,
  imageUrl: null,
};

export const TEST_CUSTOMER: CustomerProfile = {
  id: "cust-test-01",
  email: "casey@example.test",
  name: "Casey Example",
  phone: "+10000000001",
};

export const OTHER_CUSTOMER: CustomerProfile = {
  id: "cust-test-02",
  email: "robin@example.test",
  name: "Robin Example",
  phone: null,
};

export const adminActor: Actor = {
  actorId: "agent-admin-01",
  actorType: ActorType.AGENT,
  roles: [ADMIN_ROLE],
};

export const agentActor: Actor = {
  actorId: "agent-01",
  actorType: ActorType.AGENT,
  roles: [],
};

export const technicianActor: Actor = {
  actorId: "tech-01",
  actorType: ActorType.TECHNICIAN,
  roles: [],
};

export const customerActor: Actor = {
  actorId: TEST_CUSTOMER.id,
  actorType: ActorType.CUSTOMER,
  roles: [],
};

export const otherCustomerActor: Actor = {
  actorId: OTHER_CUSTOMER.id,
  actorType: ActorType.CUSTOMER,
  roles: [],
};

/** Bearer token the way the upstream auth service signs it. */
export function tokenFor(actor: Actor, secret = TEST_JWT_SECRET): string {
  return jwt.sign(
    { sub: actor.actorId, actorType: actor.actorType, roles: [...actor.roles] },
    secret,
    { expiresIn: "1h" },
  );
}
