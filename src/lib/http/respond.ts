// src/lib/http/respond.ts
// Success envelope shared by every controller.

import type { Response } from "express";
import { commitIdempotencyResponse } from "@/middleware/idempotency.middleware";

export type SuccessEnvelope<T> = { ok: true; data: T };

export async function respond<T>(res: Response, status: number, data: T): Promise<void> {
  const body: SuccessEnvelope<T> = { ok: true, data };
  await commitIdempotencyResponse(res, JSON.parse(JSON.stringify(body)), status);
  res.status(status).json(body);
}
