import { Redis } from "ioredis"
import { getRedisUrl } from "@/lib/config/settings"
import { logger } from "@/lib/utils/logger"

const log = logger.child({ service: "redis" })

// Shared connection for ledger reads/writes and publishing
let redisInstance: Redis | null = null

function retryStrategy(times: number): number | null {
  if (process.env.NODE_ENV === "production" || times < 5) {
    return Math.min(times * 50, 2000)
  }
  return null // Stop retrying after 5 attempts
}

/**
 * Get the shared Redis connection (lazy initialization).
 * Connects on first command, so importing this module never opens a socket.
 */
export function getRedis(): Redis {
  if (!redisInstance) {
    redisInstance = new Redis(getRedisUrl(), {
      maxRetriesPerRequest: null,
      enableReadyCheck: false,
      lazyConnect: true,
      retryStrategy,
    })
    redisInstance.on("error", (error: unknown) => {
      log.error("Redis connection error", error)
    })
    redisInstance.on("connect", () => {
      log.info("Redis connected")
    })
  }
  return redisInstance
}

/**
 * A dedicated connection. BullMQ workers block on their connection, and a
 * subscriber connection cannot issue regular commands, so neither may share
 * the singleton.
 */
export function createRedisConnection(): Redis {
  const connection = new Redis(getRedisUrl(), {
    maxRetriesPerRequest: null,
    enableReadyCheck: false,
    retryStrategy,
  })
  connection.on("error", (error: unknown) => {
    log.error("Redis connection error", error)
  })
  return connection
}

/**
 * Close the shared Redis connection gracefully
 */
export async function closeRedis(): Promise<void> {
  if (redisInstance) {
    const instance = redisInstance
    redisInstance = null
    try {
      await instance.quit()
    } catch (error: unknown) {
      // Never connected; drop the socket instead
      log.warn("Redis quit failed, disconnecting", { errorMessage: error instanceof Error ? error.message : String(error) })
      instance.disconnect()
    }
  }
}
