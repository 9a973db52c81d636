// src/lib/collaborators/customer-directory.ts

import type { Queryable } from "@/lib/db";

export type CustomerProfile = {
  id: string;
  email: string;
  name: string;
  phone: string | null;
};

export interface CustomerDirectory {
  lookupCustomerByEmail(email: string): Promise<string | null>;
  getCustomer(customerId: string): Promise<CustomerProfile | null>;
}

function normaliseEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class InMemoryCustomerDirectory implements CustomerDirectory {
  private readonly byId = new Map<string, CustomerProfile>();

  constructor(customers: CustomerProfile[] = []) {
    for (const customer of customers) this.add(customer);
  }

  add(customer: CustomerProfile) {
    this.byId.set(customer.id, { ...customer, email: normaliseEmail(customer.email) });
  }

  async lookupCustomerByEmail(email: string) {
    const target = normaliseEmail(email);
    return [...this.byId.values()].find((c) => c.email === target)?.id ?? null;
  }

  async getCustomer(customerId: string) {
    const customer = this.byId.get(customerId);
    return customer ? { ...customer } : null;
  }
}

export class PostgresCustomerDirectory implements CustomerDirectory {
  constructor(private readonly db: Queryable) {}

  async lookupCustomerByEmail(email: string) {
    const result = await this.db.query<{ id: string }>(
      `SELECT id FROM customers WHERE lower(email) = $1`,
      [normaliseEmail(email)],
    );
    return result.rows[0]?.id ?? null;
  }

  async getCustomer(customerId: string) {
    const result = await this.db.query<CustomerProfile>(
      `SELECT id, email, name, phone FROM customers WHERE id = $1`,
      [customerId],
    );
    return result.rows[0] ?? null;
  }
}
