type LogLevel = "debug" | "info" | "warn" | "error"

export interface LogContext {
  service?: string
  batchId?: string
  file?: string
  chunkIndex?: number
  requestId?: string
  [key: string]: unknown
}

/**
 * Standardized logger for the ingestion worker and retrieval engine.
 *
 * Log format:
 *   [UTC timestamp] [LEVEL] [service] [batchId] message {extra}
 *
 * Examples:
 *   [2026-02-22T14:19:30.072Z] [INFO ] [ingestion] [3f1c…] Started {file: "temp/report.pdf"}
 *   [2026-02-22T14:19:31.601Z] [WARN ] [ingestion] [3f1c…] Graph extraction failed {chunkIndex: 4}
 *   [2026-02-22T14:19:32.000Z] [ERROR] [retrieval] [-] Retrieval failed {errorMessage: "fetch failed"}
 *
 * Usage:
 *   logger.info("Worker listening", { queue: "doc_ingest" })
 *
 *   // Create a child logger pre-bound with context:
 *   const log = logger.child({ service: "ingestion", batchId })
 *   log.info("Summary ready")
 *   log.error("Chunk failed", err, { chunkIndex })
 */
export class Logger {
  private baseContext: LogContext

  constructor(baseContext: LogContext = {}) {
    this.baseContext = baseContext
  }

  /**
   * Create a child logger with pre-bound context fields.
   * All log calls on the child will include these fields automatically.
   */
  child(context: LogContext): Logger {
    return new Logger({ ...this.baseContext, ...context })
  }

  private formatLine(level: LogLevel, message: string, context?: LogContext): string {
    const merged = { ...this.baseContext, ...context }
    const ts = new Date().toISOString()
    const lvl = level.toUpperCase().padEnd(5)
    const svc = merged.service ?? "-"
    const batchId = merged.batchId ?? "-"

    const knownKeys = new Set(["service", "batchId"])
    const extra: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(merged)) {
      if (!knownKeys.has(k) && v !== undefined) {
        extra[k] = v
      }
    }
    const extraStr = Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : ""

    return `[${ts}] [${lvl}] [${svc}] [${batchId}] ${message}${extraStr}`
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    const line = this.formatLine(level, message, context)

    switch (level) {
      case "debug":
        if (process.env.NODE_ENV === "development" || process.env.LOG_LEVEL?.toLowerCase() === "debug") {
          console.debug(line)
        }
        break
      case "info":
        console.info(line)
        break
      case "warn":
        console.warn(line)
        break
      case "error":
        console.error(line)
        break
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context)
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context)
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context)
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    const errorFields: LogContext = {}
    if (error instanceof Error) {
      errorFields.errorName = error.name
      errorFields.errorMessage = error.message
      errorFields.errorStack = error.stack
    } else if (error !== undefined) {
      errorFields.errorMessage = String(error)
    }
    this.log("error", message, { ...context, ...errorFields })
  }
}

export const logger = new Logger()
