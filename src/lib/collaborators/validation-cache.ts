// src/lib/collaborators/validation-cache.ts
// Read-through cache for public warranty validation. Values are opaque JSON strings.

import type Redis from "ioredis";
import type { Clock } from "@/lib/clock";

export interface ValidationCache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  invalidate(key: string): Promise<void>;
}

export class RedisValidationCache implements ValidationCache {
  constructor(
    private readonly redis: Redis,
    private readonly namespace = "warranty:public",
  ) {}

  private keyOf(key: string) {
    return `${this.namespace}:${key}`;
  }

  async get(key: string) {
    return this.redis.get(this.keyOf(key));
  }

  async set(key: string, value: string, ttlSeconds: number) {
    if (ttlSeconds <= 0) return;
    await this.redis.set(this.keyOf(key), value, "EX", ttlSeconds);
  }

  async invalidate(key: string) {
    await this.redis.del(this.keyOf(key));
  }
}

export class InMemoryValidationCache implements ValidationCache {
  private readonly entries = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly clock: Clock) {}

  async get(key: string) {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number) {
    if (ttlSeconds <= 0) return;
    this.entries.set(key, {
      value,
      expiresAt: this.clock.now().getTime() + ttlSeconds * 1000,
    });
  }

  async invalidate(key: string) {
    this.entries.delete(key);
  }

  get size() {
    return this.entries.size;
  }
}
