// db/seed.ts
/**
 * Purpose:
 * Development seed for the read-only catalog tables (products, customers)
 * that the warranty service consumes but does not own.
 *
 * Runs after `npm run migrate` against DATABASE_URL. Rows are upserted by
 * their natural keys (sku, email), so re-running is safe.
 */

import { faker } from "@faker-js/faker";
import { closePool, getPool, withTransaction } from "@/lib/db";
import { errorMeta, log } from "@/lib/observability/logger";
import { newId } from "@/utils/uuid";

////////////////////////////////////////////////////////////////
// CONFIG
////////////////////////////////////////////////////////////////

const PRODUCT_COUNT = 12;
const CUSTOMER_COUNT = 25;
const CATEGORIES = ["Phones", "Laptops", "Tablets", "Audio", "Wearables"];

// stable output across runs
faker.seed(1042);

////////////////////////////////////////////////////////////////
// HELPERS
////////////////////////////////////////////////////////////////

function fakeProduct(index: number) {
  const category = faker.helpers.arrayElement(CATEGORIES);
  return {
    id: newId(),
    name: `${faker.company.name()} ${faker.commerce.productName()}`,
    sku: `SKU-${category.slice(0, 3).toUpperCase()}-${String(index + 1).padStart(3, "0")}`,
    brand: faker.company.name(),
    category,
    description: faker.commerce.productDescription(),
    basePrice: Number(faker.commerce.price({ min: 49, max: 2499 })),
    imageUrl: faker.image.url(),
  };
}

function fakeCustomer(index: number) {
  const firstName = faker.person.firstName();
  const lastName = faker.person.lastName();
  return {
    id: `cust-${String(index + 1).padStart(4, "0")}`,
    email: `${firstName}.${lastName}.${index}@example.com`.toLowerCase(),
    name: `${firstName} ${lastName}`,
    phone: faker.phone.number(),
  };
}

////////////////////////////////////////////////////////////////
// MAIN
////////////////////////////////////////////////////////////////

async function main() {
  const databaseUrl = process.env.DATABASE_URL;
  if (!databaseUrl) throw new Error("DATABASE_URL is required to seed");

  const pool = getPool(databaseUrl);

  await withTransaction(pool, async (client) => {
    for (let i = 0; i < PRODUCT_COUNT; i++) {
      const p = fakeProduct(i);
      await client.query(
        `INSERT INTO products (id, name, sku, brand, category, description, base_price, image_url)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         ON CONFLICT (sku) DO NOTHING`,
        [p.id, p.name, p.sku, p.brand, p.category, p.description, p.basePrice, p.imageUrl],
      );
    }

    for (let i = 0; i < CUSTOMER_COUNT; i++) {
      const c = fakeCustomer(i);
      await client.query(
        `INSERT INTO customers (id, email, name, phone)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (email) DO NOTHING`,
        [c.id, c.email, c.name, c.phone],
      );
    }
  });

  log("INFO", "SEED_COMPLETED", { products: PRODUCT_COUNT, customers: CUSTOMER_COUNT });
}

main()
  .then(() => closePool())
  .catch(async (err: unknown) => {
    log("ERROR", "SEED_FAILED", errorMeta(err));
    await closePool();
    process.exit(1);
  });
