// src/lib/collaborators/product-catalog.ts
// Read-only product lookups. Product CRUD is owned elsewhere.

import type { Queryable } from "@/lib/db";
import { toNumber } from "@/lib/store/postgres/sql";

export type ProductSummary = {
  id: string;
  name: string;
  sku: string;
  brand: string | null;
  category: string | null;
  description: string | null;
  basePrice: number | null;
  imageUrl: string | null;
};

export interface ProductCatalog {
  lookupProduct(productId: string): Promise<ProductSummary | null>;
  lookupProductBySku(sku: string): Promise<ProductSummary | null>;
}

export class InMemoryProductCatalog implements ProductCatalog {
  private readonly byId = new Map<string, ProductSummary>();

  constructor(products: ProductSummary[] = []) {
    for (const product of products) this.add(product);
  }

  add(product: ProductSummary) {
    this.byId.set(product.id, { ...product });
  }

  async lookupProduct(productId: string) {
    const product = this.byId.get(productId);
    return product ? { ...product } : null;
  }

  async lookupProductBySku(sku: string) {
    const product = [...this.byId.values()].find((p) => p.sku === sku);
    return product ? { ...product } : null;
  }
}

type ProductRow = {
  id: string;
  name: string;
  sku: string;
  brand: string | null;
  category: string | null;
  description: string | null;
  base_price: string | null;
  image_url: string | null;
};

function toProduct(row: ProductRow): ProductSummary {
  return {
    id: row.id,
    name: row.name,
    sku: row.sku,
    brand: row.brand,
    category: row.category,
    description: row.description,
    basePrice: toNumber(row.base_price),
    imageUrl: row.image_url,
  };
}

export class PostgresProductCatalog implements ProductCatalog {
  constructor(private readonly db: Queryable) {}

  async lookupProduct(productId: string) {
    const result = await this.db.query<ProductRow>(
      `SELECT id, name, sku, brand, category, description, base_price, image_url
         FROM products WHERE id::text = $1`,
      [productId],
    );
    return result.rows[0] ? toProduct(result.rows[0]) : null;
  }

  async lookupProductBySku(sku: string) {
    const result = await this.db.query<ProductRow>(
      `SELECT id, name, sku, brand, category, description, base_price, image_url
         FROM products WHERE sku = $1`,
      [sku],
    );
    return result.rows[0] ? toProduct(result.rows[0]) : null;
  }
}
