/**
 * RedisLedgerStore - ILedgerStore using Redis (ioredis).
 * Keys are stored as given (`job:…`, `hash:…`) so the ledger can be
 * inspected with redis-cli.
 */

import type { Redis } from "ioredis"
import type { ILedgerStore } from "@/lib/ports/ledger-store"
import type { HealthStatus } from "@/lib/ports/types"
import { getRedis } from "@/lib/queue/redis"

const SCAN_COUNT = 500

export class RedisLedgerStore implements ILedgerStore {
  constructor(private readonly redis: () => Redis = getRedis) {}

  async get(key: string): Promise<string | null> {
    return this.redis().get(key)
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis().set(key, value)
  }

  async setIfNotExists(key: string, value: string): Promise<boolean> {
    const result = await this.redis().set(key, value, "NX")
    return result === "OK"
  }

  async delete(key: string): Promise<void> {
    await this.redis().del(key)
  }

  async deleteByPrefix(prefix: string): Promise<number> {
    const redis = this.redis()
    let cursor = "0"
    let deleted = 0
    do {
      const [next, keys] = await redis.scan(cursor, "MATCH", `${prefix}*`, "COUNT", SCAN_COUNT)
      cursor = next
      if (keys.length > 0) {
        deleted += await redis.del(...keys)
      }
    } while (cursor !== "0")
    return deleted
  }

  async healthCheck(): Promise<HealthStatus> {
    const start = Date.now()
    try {
      await this.redis().ping()
      return { status: "up", latencyMs: Date.now() - start }
    } catch {
      return { status: "down", latencyMs: Date.now() - start }
    }
  }
}
