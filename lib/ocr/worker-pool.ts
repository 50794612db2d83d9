/**
 * @fileoverview Bounded pool of OCR engines shared by a run
 * @module lib/ocr/worker-pool
 */

import pLimit, { type LimitFunction } from "p-limit"
import { InternalError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import type { OcrEngine, OcrEngineFactory, OcrWord } from "./types"

/**
 * Runs OCR jobs on at most `size` engines at once.
 *
 * Engines are created lazily, one per concurrent slot, and reused while
 * idle. Call `close()` once the run is done; it terminates every engine
 * the pool created.
 *
 * @example
 * ```ts
 * const pool = new OcrWorkerPool(tesseractEngineFactory({ language: "eng" }), 4)
 * try {
 *   const words = await pool.recognize(png)
 * } finally {
 *   await pool.close()
 * }
 * ```
 */
export class OcrWorkerPool {
  private readonly limit: LimitFunction
  private readonly idle: OcrEngine[] = []
  private readonly engines: OcrEngine[] = []
  private closed = false

  constructor(
    private readonly factory: OcrEngineFactory,
    readonly size: number
  ) {
    this.limit = pLimit(size)
  }

  /** Engines created so far */
  get engineCount(): number {
    return this.engines.length
  }

  recognize(image: Uint8Array): Promise<OcrWord[]> {
    return this.run((engine) => engine.recognize(image))
  }

  run<T>(task: (engine: OcrEngine) => Promise<T>): Promise<T> {
    return this.limit(async () => {
      if (this.closed) {
        throw new InternalError("OCR worker pool is closed")
      }
      const engine = this.idle.pop() ?? (await this.createEngine())
      try {
        return await task(engine)
      } finally {
        this.idle.push(engine)
      }
    })
  }

  async close(): Promise<void> {
    this.closed = true
    const engines = this.engines.splice(0)
    this.idle.length = 0
    const results = await Promise.allSettled(engines.map((engine) => engine.terminate()))
    for (const result of results) {
      if (result.status === "rejected") {
        logger.warn("OCR engine did not terminate cleanly", {
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        })
      }
    }
  }

  private async createEngine(): Promise<OcrEngine> {
    const engine = await this.factory()
    this.engines.push(engine)
    logger.debug("OCR engine started", { engines: this.engines.length, poolSize: this.size })
    return engine
  }
}
