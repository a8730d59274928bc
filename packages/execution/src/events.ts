/**
 * Structured run events (JSONL format)
 *
 * The orchestrator reports its lifecycle as events: one JSON object per
 * line, written to a file or stdout and handed to an optional in-process
 * listener (the CLI uses one to drive its progress display).
 */

import { type WriteStream, createWriteStream } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'

import type { OutcomeKind, RunStatus, SkippedKind } from '@wsk/core'

// ============================================================================
// Event Types
// ============================================================================

/** Base event fields included in all events */
export interface BaseEvent {
  /** Event type identifier */
  event: string
  /** ISO 8601 timestamp */
  timestamp: string
}

/** Emitted once planning has resolved the execution order */
export interface RunStartedEvent extends BaseEvent {
  event: 'run_started'
  skill: string
  /** Requested targets (empty means the whole workspace) */
  targets: string[]
  /** Resolved order, dependencies first */
  order: string[]
  concurrency: number
}

/** Emitted when a package is recorded without being attempted */
export interface PackageSkippedEvent extends BaseEvent {
  event: 'package_skipped'
  package: string
  kind: SkippedKind
  reason: string
}

/** Emitted when a package's subprocess is launched */
export interface PackageStartedEvent extends BaseEvent {
  event: 'package_started'
  package: string
  command: string[]
  cwd: string
  attempt: number
}

/** Emitted when a package's subprocess has terminated */
export interface PackageCompletedEvent extends BaseEvent {
  event: 'package_completed'
  package: string
  kind: OutcomeKind
  exitCode: number | null
  durationMs: number
  attempt: number
  reason?: string | undefined
  /** Whether the retry policy will run the package again */
  willRetry?: boolean | undefined
}

/** Emitted periodically while packages are running */
export interface HeartbeatEvent extends BaseEvent {
  event: 'heartbeat'
  /** Duration since the run started (milliseconds) */
  durationMs: number
  /** Packages currently running */
  running: string[]
}

/** Emitted when the run summary is final */
export interface RunCompletedEvent extends BaseEvent {
  event: 'run_completed'
  status: RunStatus
  totalDurationMs: number
  failed: string[]
  skipped: number
}

/** Union of all event types */
export type RunEvent =
  | RunStartedEvent
  | PackageSkippedEvent
  | PackageStartedEvent
  | PackageCompletedEvent
  | HeartbeatEvent
  | RunCompletedEvent

/** Omit applied to each union member so discriminated fields survive */
type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

/** An event before the emitter stamps it */
export type RunEventInput = DistributiveOmit<RunEvent, 'timestamp'>

export type RunEventListener = (event: RunEvent) => void

// ============================================================================
// Event Emitter
// ============================================================================

/** Options for creating an event emitter */
export interface EventEmitterOptions {
  /** Path to write events (JSONL file, appended) */
  outputPath?: string | undefined
  /** Write to stdout instead of file */
  stdout?: boolean | undefined
  /** In-process listener, called synchronously for every event */
  listener?: RunEventListener | undefined
  /** Heartbeat interval in milliseconds (0 to disable) */
  heartbeatIntervalMs?: number | undefined
}

/**
 * Event emitter for structured run events.
 */
export class RunEventEmitter {
  private readonly outputPath: string | undefined
  private readonly stdout: boolean
  private readonly listener: RunEventListener | undefined
  private readonly heartbeatIntervalMs: number
  private stream: WriteStream | undefined
  private heartbeatTimer: ReturnType<typeof setInterval> | undefined
  private startTime: number
  private readonly running = new Set<string>()
  private closed = false

  constructor(options: EventEmitterOptions = {}) {
    this.outputPath = options.outputPath
    this.stdout = options.stdout ?? false
    this.listener = options.listener
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 0
    this.startTime = Date.now()
  }

  /**
   * Initialize the event stream (create file if needed).
   */
  async init(): Promise<void> {
    if (this.outputPath && !this.stdout) {
      await mkdir(dirname(this.outputPath), { recursive: true })
      this.stream = createWriteStream(this.outputPath, { flags: 'a' })
    }
  }

  /**
   * Emit an event.
   */
  emit(event: RunEventInput): void {
    if (this.closed) return

    const fullEvent = { ...event, timestamp: new Date().toISOString() } satisfies RunEvent

    if (fullEvent.event === 'package_started') {
      this.running.add(fullEvent.package)
    } else if (fullEvent.event === 'package_completed') {
      this.running.delete(fullEvent.package)
    }

    this.writeEvent(fullEvent)
    this.listener?.(fullEvent)
  }

  /**
   * Emit run_started and start the heartbeat timer.
   */
  emitRunStarted(data: Omit<RunStartedEvent, 'event' | 'timestamp'>): void {
    this.startTime = Date.now()
    this.emit({ event: 'run_started', ...data })

    if (this.heartbeatIntervalMs > 0 && !this.heartbeatTimer) {
      this.heartbeatTimer = setInterval(() => {
        this.emitHeartbeat()
      }, this.heartbeatIntervalMs)
      this.heartbeatTimer.unref()
    }
  }

  emitPackageSkipped(data: Omit<PackageSkippedEvent, 'event' | 'timestamp'>): void {
    this.emit({ event: 'package_skipped', ...data })
  }

  emitPackageStarted(data: Omit<PackageStartedEvent, 'event' | 'timestamp'>): void {
    this.emit({ event: 'package_started', ...data })
  }

  emitPackageCompleted(data: Omit<PackageCompletedEvent, 'event' | 'timestamp'>): void {
    this.emit({ event: 'package_completed', ...data })
  }

  /**
   * Emit a heartbeat event listing running packages.
   */
  emitHeartbeat(): void {
    if (this.closed) return
    this.emit({
      event: 'heartbeat',
      durationMs: Date.now() - this.startTime,
      running: [...this.running].sort(),
    })
  }

  /**
   * Emit run_completed.
   */
  emitRunCompleted(data: Omit<RunCompletedEvent, 'event' | 'timestamp' | 'totalDurationMs'>): void {
    this.emit({
      event: 'run_completed',
      totalDurationMs: Date.now() - this.startTime,
      ...data,
    })
  }

  /**
   * Close the event emitter.
   */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer)
      this.heartbeatTimer = undefined
    }

    if (this.stream) {
      const stream = this.stream
      await new Promise<void>((resolve, reject) => {
        stream.once('error', reject)
        stream.end(() => resolve())
      })
      this.stream = undefined
    }
  }

  private writeEvent(event: RunEvent): void {
    const line = `${JSON.stringify(event)}\n`

    if (this.stdout) {
      process.stdout.write(line)
    } else if (this.stream) {
      this.stream.write(line)
    }
  }
}

/**
 * Create and initialize an event emitter.
 */
export async function createEventEmitter(options: EventEmitterOptions): Promise<RunEventEmitter> {
  const emitter = new RunEventEmitter(options)
  await emitter.init()
  return emitter
}
