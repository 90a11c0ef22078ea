/**
 * Photo Sync Service
 *
 * Runs the mirror pipeline once per invocation: tag gathering, then the
 * fetch, push and placement passes, then pruning. Every stage flushes the
 * record repository before the next one starts.
 *
 * Only one run may be active at a time; a second trigger while a run is in
 * progress returns a skipped result. {@link PhotoSyncService.requestStop}
 * ends the active run at the next record or stage boundary.
 *
 * @example
 * const result = await fastify.photoSync.run()
 */
import type { RemoteLibraryClient } from '@root/types/google-photos.types.js'
import type {
  LocalFileStore,
  PhotoSyncResult,
  PhotoSyncSettings,
  PhotoSyncStatus,
  StateStore,
} from '@root/types/photo-sync.types.js'
import { runPrune } from '@services/photo-sync/pruning/index.js'
import {
  runFetchPass,
  runPlacementPass,
  runPushPass,
} from '@services/photo-sync/reconciliation/index.js'
import { ItemRecordRepository } from '@services/photo-sync/state/item-record-repository.js'
import {
  AlbumDirectory,
  createEmptyGatherResult,
  runTagGathering,
} from '@services/photo-sync/tag-gathering/index.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface PhotoSyncServiceDeps {
  stateStore: StateStore
  remote: RemoteLibraryClient
  files: LocalFileStore
  /** Read at the start of every run */
  settings: () => PhotoSyncSettings
  now?: () => Date
}

export function createEmptySyncResult(
  startedAt: Date,
  skipped = false,
): PhotoSyncResult {
  return {
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    skipped,
    cancelled: false,
    gather: createEmptyGatherResult(),
    fetch: { downloaded: 0, failed: 0 },
    push: { uploaded: 0, failed: 0, albumLinks: 0 },
    placement: { moved: 0, relabelled: 0, failed: 0 },
    prune: { removed: 0, fileDeleteFailures: 0 },
  }
}

export class PhotoSyncService {
  private readonly log: FastifyBaseLogger

  /**
   * Flag to prevent concurrent runs
   */
  private _running = false
  private stopRequested = false
  private inFlight: Promise<PhotoSyncResult> | null = null
  private lastResult: PhotoSyncResult | null = null
  private lastRunStartedAt: string | null = null

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly deps: PhotoSyncServiceDeps,
  ) {
    this.log = createServiceLogger(baseLog, 'PHOTO_SYNC')
    this.log.info('Initializing Photo Sync Service')
  }

  get isRunning(): boolean {
    return this._running
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date()
  }

  getStatus(): PhotoSyncStatus {
    return {
      running: this._running,
      lastRunStartedAt: this.lastRunStartedAt,
      lastRunFinishedAt: this.lastResult?.finishedAt ?? null,
      lastResult: this.lastResult,
    }
  }

  /**
   * Runs the full pipeline once
   *
   * @returns the run summary; `skipped` when another run was in progress
   */
  async run(): Promise<PhotoSyncResult> {
    if (this._running) {
      this.log.warn('Photo sync already in progress; ignoring duplicate trigger')
      return createEmptySyncResult(this.now(), true)
    }

    this._running = true
    this.stopRequested = false
    this.inFlight = this.execute()
    try {
      return await this.inFlight
    } finally {
      this._running = false
      this.inFlight = null
    }
  }

  /**
   * Asks the active run to end at the next record or stage boundary. Work
   * already done is flushed.
   */
  requestStop(): void {
    if (this._running) {
      this.log.info('Stop requested for the active photo sync run')
      this.stopRequested = true
    }
  }

  /**
   * Resolves once no run is active
   */
  async waitForIdle(): Promise<void> {
    if (!this.inFlight) return
    try {
      await this.inFlight
    } catch (error) {
      this.log.warn({ error }, 'Photo sync run ended with an error')
    }
  }

  private async execute(): Promise<PhotoSyncResult> {
    const startedAt = this.now()
    this.lastRunStartedAt = startedAt.toISOString()
    const result = createEmptySyncResult(startedAt)
    const shouldStop = () => this.stopRequested

    const { stateStore, remote, files } = this.deps
    const { windowDays, albums } = this.deps.settings()
    const logger = this.log

    this.log.info(
      `Starting photo sync (window: ${windowDays} days, albums: ${albums.length > 0 ? albums.join(', ') : 'none'})`,
    )

    try {
      const repository = new ItemRecordRepository(stateStore)
      await repository.load()
      this.log.debug(`Loaded ${repository.size} item records`)

      // Album ids are resolved at most once per run
      const albumDirectory = new AlbumDirectory(remote, logger)

      result.gather = await runTagGathering(
        { repository, remote, albumDirectory, logger, windowDays, now: startedAt },
        albums,
        shouldStop,
      )

      if (!shouldStop()) {
        result.fetch = await runFetchPass({
          repository,
          remote,
          files,
          logger,
          shouldStop,
        })
      }

      if (!shouldStop()) {
        result.push = await runPushPass({
          repository,
          remote,
          files,
          albumDirectory,
          trackedAlbums: albums,
          logger,
          windowDays,
          now: startedAt,
          shouldStop,
        })
      }

      if (!shouldStop()) {
        result.placement = await runPlacementPass({
          repository,
          files,
          logger,
          shouldStop,
        })
      }

      // Tags may be only partly gathered after a stop
      if (!shouldStop()) {
        result.prune = await runPrune({ repository, files, logger })
      }

      await repository.flush()
      result.cancelled = shouldStop()
    } catch (error) {
      this.log.error({ error }, 'Error in photo sync run')
      throw error
    } finally {
      result.finishedAt = this.now().toISOString()
      this.lastResult = result
    }

    this.logSummary(result)
    return result
  }

  private logSummary(result: PhotoSyncResult): void {
    const { gather, fetch, push, placement, prune } = result
    this.log.info(
      {
        gather: {
          created: gather.created,
          missingAlbums: gather.missingAlbums,
        },
        fetch,
        push,
        placement,
        prune,
      },
      result.cancelled ? 'Photo sync cancelled' : 'Photo sync completed',
    )
  }
}
