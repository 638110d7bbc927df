// src/scheduler/scheduler.ts — Named periodic tasks with independent cadences
//
// Every task owns its timer. The next tick is armed before the handler runs, so
// a slow handler never delays its own cadence; a tick that finds the previous
// run still going is skipped, never stacked.

import { Cron } from "croner"
import { MeteringError } from "../errors.js"
import { TELEMETRY, type TelemetryRegistry } from "../gateway/telemetry.js"
import {
  CircuitBreaker,
  DEFAULT_CIRCUIT_CONFIG,
  type CircuitBreakerConfig,
  type CircuitState,
} from "./circuit-breaker.js"

export type TaskCadence =
  | { kind: "every"; intervalMs: number; jitterMs?: number }
  /** Local wall-clock time, 24h "HH:MM" */
  | { kind: "daily"; at: string }

export interface ScheduledTaskDef {
  id: string
  name: string
  cadence: TaskCadence
  /** Receives the scheduler's shutdown signal */
  handler: (signal: AbortSignal) => Promise<void>
  circuitBreakerConfig?: Partial<CircuitBreakerConfig>
}

interface RunningTask {
  def: ScheduledTaskDef
  cron: Cron | undefined
  timer: ReturnType<typeof setTimeout> | undefined
  circuitBreaker: CircuitBreaker
  run: Promise<void> | undefined
  nextRunAt: number | undefined
  lastRun: number | undefined
  lastError: string | undefined
  skippedTicks: number
}

export interface TaskStatus {
  id: string
  name: string
  state: "running" | "waiting" | "error"
  lastRun: number | undefined
  lastError: string | undefined
  nextRunAt: number | undefined
  skippedTicks: number
  circuitBreakerState: CircuitState
  circuitBreakerFailures: number
}

const TIME_OF_DAY_RE = /^([01]\d|2[0-3]):([0-5]\d)$/
const MIN_DELAY_MS = 1000

/** Croner pattern firing daily at a local "HH:MM". */
export function dailyPattern(at: string): string {
  const match = TIME_OF_DAY_RE.exec(at)
  if (!match) throw new Error(`Invalid time of day "${at}": expected HH:MM (24h)`)
  return `${Number(match[2])} ${Number(match[1])} * * *`
}

export class Scheduler {
  private readonly tasks = new Map<string, RunningTask>()
  private readonly shutdown = new AbortController()
  private started = false
  private readonly clock: () => number
  private readonly random: () => number
  private readonly telemetry: TelemetryRegistry | undefined

  constructor(deps: { clock?: () => number; random?: () => number; telemetry?: TelemetryRegistry } = {}) {
    this.clock = deps.clock ?? Date.now
    this.random = deps.random ?? Math.random
    this.telemetry = deps.telemetry
  }

  /** Aborted by stop(); handed to every handler. */
  get signal(): AbortSignal {
    return this.shutdown.signal
  }

  register(def: ScheduledTaskDef): void {
    if (this.tasks.has(def.id)) throw new Error(`Task "${def.id}" is already registered`)
    if (def.cadence.kind === "every" && def.cadence.intervalMs <= 0) {
      throw new Error(`Task "${def.id}": intervalMs must be > 0`)
    }

    const cb = new CircuitBreaker(def.id, { ...DEFAULT_CIRCUIT_CONFIG, ...def.circuitBreakerConfig }, this.clock)
    cb.onTransition((taskId, from, to) => {
      console.warn(`[scheduler] task ${taskId} circuit ${from} -> ${to}`)
    })

    const task: RunningTask = {
      def,
      cron: def.cadence.kind === "daily" ? new Cron(dailyPattern(def.cadence.at)) : undefined,
      timer: undefined,
      circuitBreaker: cb,
      run: undefined,
      nextRunAt: undefined,
      lastRun: undefined,
      lastError: undefined,
      skippedTicks: 0,
    }
    this.tasks.set(def.id, task)
    if (this.started) this.scheduleNext(task)
  }

  start(): void {
    if (this.started || this.shutdown.signal.aborted) return
    this.started = true
    for (const task of this.tasks.values()) this.scheduleNext(task)
  }

  /** Clear every timer and abort the shutdown signal. Running handlers keep going until they notice. */
  stop(): void {
    this.started = false
    for (const task of this.tasks.values()) {
      if (task.timer) {
        clearTimeout(task.timer)
        task.timer = undefined
      }
      task.nextRunAt = undefined
    }
    if (!this.shutdown.signal.aborted) {
      this.shutdown.abort(new MeteringError({ code: "CYCLE_ABORTED", message: "scheduler stopped" }))
    }
  }

  /** Resolve once every running handler has finished. */
  async drain(): Promise<void> {
    const running = [...this.tasks.values()].flatMap((t) => (t.run ? [t.run] : []))
    await Promise.all(running)
  }

  /**
   * Run a task now and resolve when it finishes. If it is already running the
   * in-flight run is awaited instead of starting a second one.
   */
  triggerNow(id: string): Promise<void> {
    const task = this.tasks.get(id)
    if (!task) return Promise.reject(new Error(`Unknown task "${id}"`))
    if (task.run) {
      console.log(`[scheduler] task ${id} already running, waiting for it`)
      return task.run
    }
    return this.runTask(task)
  }

  getStatus(): TaskStatus[] {
    return Array.from(this.tasks.values()).map((t) => {
      const cbState = t.circuitBreaker.getState()
      let state: TaskStatus["state"] = "waiting"
      if (t.run) state = "running"
      else if (t.lastError && cbState === "open") state = "error"

      return {
        id: t.def.id,
        name: t.def.name,
        state,
        lastRun: t.lastRun,
        lastError: t.lastError,
        nextRunAt: t.nextRunAt,
        skippedTicks: t.skippedTicks,
        circuitBreakerState: cbState,
        circuitBreakerFailures: t.circuitBreaker.getStats().consecutiveFailures,
      }
    })
  }

  private nextDelay(task: RunningTask): number | undefined {
    const { cadence } = task.def
    if (cadence.kind === "every") {
      const jitterMs = cadence.jitterMs ?? 0
      const jitter = jitterMs * (2 * this.random() - 1) // ±jitter
      return Math.max(MIN_DELAY_MS, cadence.intervalMs + jitter)
    }
    const now = this.clock()
    const next = task.cron?.nextRun(new Date(now))
    return next ? Math.max(0, next.getTime() - now) : undefined
  }

  private scheduleNext(task: RunningTask): void {
    if (!this.started) return
    const delay = this.nextDelay(task)
    if (delay === undefined) {
      console.error(`[scheduler] task ${task.def.id} has no next run time`)
      return
    }

    task.nextRunAt = this.clock() + delay
    task.timer = setTimeout(() => {
      this.scheduleNext(task)
      this.tick(task)
    }, delay)
    task.timer.unref()
  }

  private tick(task: RunningTask): void {
    if (task.run) {
      task.skippedTicks++
      this.telemetry?.incrementCounter(TELEMETRY.schedulerSkips, { task: task.def.id })
      console.warn(`[scheduler] task ${task.def.id} still running, tick skipped`)
      return
    }
    // runTask settles the run itself; drain() awaits it through task.run
    this.runTask(task).catch((err: unknown) => {
      console.error(`[scheduler] task ${task.def.id} run bookkeeping failed:`, err)
    })
  }

  private runTask(task: RunningTask): Promise<void> {
    const run = (async () => {
      try {
        await task.circuitBreaker.execute(() => task.def.handler(this.shutdown.signal))
        task.lastRun = this.clock()
        task.lastError = undefined
      } catch (err) {
        task.lastRun = this.clock()
        task.lastError = err instanceof Error ? err.message : String(err)
        console.error(`[scheduler] task ${task.def.id} failed:`, task.lastError)
      } finally {
        task.run = undefined
      }
    })()
    task.run = run
    return run
  }
}
