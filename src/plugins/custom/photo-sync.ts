/**
 * Photo Sync Plugin
 *
 * Registers the PhotoSyncService and, when an interval is configured, the
 * recurring 'photo-sync' scheduler job.
 */
import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { PhotoSyncService } from '@services/photo-sync.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    photoSync: PhotoSyncService
  }
}

export const PHOTO_SYNC_JOB = 'photo-sync'

export default fp(
  async (fastify: FastifyInstance) => {
    fastify.log.info('Initializing photo sync plugin')

    const service = new PhotoSyncService(fastify.log, {
      stateStore: fastify.db,
      remote: fastify.googlePhotos,
      files: fastify.localFiles,
      settings: () => ({
        windowDays: fastify.config.windowDays,
        albums: fastify.config.albums,
      }),
    })
    fastify.decorate('photoSync', service)

    fastify.addHook('onReady', async () => {
      const minutes = fastify.config.syncIntervalMinutes
      if (minutes <= 0) {
        fastify.log.info('Scheduled photo sync is disabled')
        return
      }

      fastify.scheduler.scheduleJob(PHOTO_SYNC_JOB, { minutes }, async () => {
        const result = await service.run()
        if (result.skipped) return

        const { fetch, push, prune } = result
        if (fetch.downloaded > 0 || push.uploaded > 0 || prune.removed > 0) {
          fastify.log.info(
            `Photo sync completed: ${fetch.downloaded} downloaded, ${push.uploaded} uploaded, ${prune.removed} removed`,
          )
        }
      })
    })

    fastify.addHook('onClose', async () => {
      service.requestStop()
      await service.waitForIdle()
    })
  },
  {
    name: 'photo-sync',
    dependencies: [
      'config',
      'database',
      'google-photos',
      'local-file-store',
      'scheduler',
    ],
  },
)
