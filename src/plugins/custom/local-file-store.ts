import fp from 'fastify-plugin'
import type { FastifyInstance } from 'fastify'
import { LocalFileStoreService } from '@services/local-file-store.service.js'

declare module 'fastify' {
  interface FastifyInstance {
    localFiles: LocalFileStoreService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const store = new LocalFileStoreService(fastify.config.photosDir)
    await store.ensureRoot()
    fastify.log.info(`Mirroring photos into ${store.rootPath}`)
    fastify.decorate('localFiles', store)
  },
  {
    name: 'local-file-store',
    dependencies: ['config'],
  },
)
