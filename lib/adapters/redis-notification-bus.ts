/**
 * RedisNotificationBus - INotificationBus over Redis pub/sub.
 *
 * Publishing goes through the shared connection. Each subscription opens its
 * own connection (a subscribed ioredis client accepts no other commands),
 * buffers incoming messages and drains the buffer every poll interval until
 * the caller's signal aborts or the connection ends.
 */

import type { Redis } from "ioredis"
import { NOTIFICATION_POLL_MS } from "@/lib/config/settings"
import { batchChannel, decodeProgressEvent } from "@/lib/notifications/events"
import type { INotificationBus } from "@/lib/ports/notification-bus"
import type { ProgressEvent } from "@/lib/ports/types"
import { createRedisConnection, getRedis } from "@/lib/queue/redis"
import { logger } from "@/lib/utils/logger"
import { sleep } from "@/lib/utils/retry"

export interface RedisNotificationBusOptions {
  publisher?: () => Redis
  subscriber?: () => Redis
  pollIntervalMs?: number
}

export class RedisNotificationBus implements INotificationBus {
  private readonly publisher: () => Redis
  private readonly subscriber: () => Redis
  private readonly pollIntervalMs: number
  private readonly log = logger.child({ service: "notification-bus" })

  constructor(options: RedisNotificationBusOptions = {}) {
    this.publisher = options.publisher ?? getRedis
    this.subscriber = options.subscriber ?? createRedisConnection
    this.pollIntervalMs = options.pollIntervalMs ?? NOTIFICATION_POLL_MS
  }

  /** Fire-and-forget: a failed publish is logged, never raised. */
  async publish(batchId: string, event: ProgressEvent): Promise<void> {
    try {
      await this.publisher().publish(batchChannel(batchId), JSON.stringify(event))
    } catch (error: unknown) {
      this.log.warn("Progress publish failed", {
        batchId,
        file: event.file,
        errorMessage: error instanceof Error ? error.message : String(error),
      })
    }
  }

  async *subscribe(batchId: string, options: { signal?: AbortSignal } = {}): AsyncIterable<ProgressEvent> {
    const { signal } = options
    const channel = batchChannel(batchId)
    const connection = this.subscriber()
    const buffer: ProgressEvent[] = []
    let closed = false
    const markClosed = () => {
      closed = true
    }
    connection.once("end", markClosed)
    connection.once("close", markClosed)

    connection.on("message", (from: string, message: string) => {
      if (from !== channel) return
      const event = decodeProgressEvent(message)
      if (event) buffer.push(event)
    })

    try {
      await connection.subscribe(channel)
      while (!signal?.aborted && !closed) {
        while (buffer.length > 0) {
          const next = buffer.shift()
          if (next) yield next
        }
        await sleep(this.pollIntervalMs)
      }
      // Messages that arrived before the connection went away
      while (!signal?.aborted && buffer.length > 0) {
        const next = buffer.shift()
        if (next) yield next
      }
    } finally {
      connection.off("end", markClosed)
      connection.off("close", markClosed)
      if (closed) {
        this.log.info("Subscriber connection closed", { batchId })
      } else {
        try {
          await connection.unsubscribe(channel)
          await connection.quit()
        } catch (error: unknown) {
          this.log.warn("Subscriber close failed", {
            batchId,
            errorMessage: error instanceof Error ? error.message : String(error),
          })
          connection.disconnect()
        }
      }
    }
  }
}
