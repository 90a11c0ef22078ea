import { z } from 'zod'
import { ErrorSchema } from '@root/schemas/common/error.schema.js'

export const GatherResultSchema = z.object({
  created: z.number(),
  starred: z.number(),
  unstarred: z.number(),
  windowEntered: z.number(),
  windowExpired: z.number(),
  albumAdded: z.number(),
  albumRemoved: z.number(),
  missingAlbums: z.array(z.string()),
})

export const PhotoSyncResultSchema = z.object({
  startedAt: z.string(),
  finishedAt: z.string(),
  skipped: z.boolean(),
  cancelled: z.boolean(),
  gather: GatherResultSchema,
  fetch: z.object({
    downloaded: z.number(),
    failed: z.number(),
  }),
  push: z.object({
    uploaded: z.number(),
    failed: z.number(),
    albumLinks: z.number(),
  }),
  placement: z.object({
    moved: z.number(),
    relabelled: z.number(),
    failed: z.number(),
  }),
  prune: z.object({
    removed: z.number(),
    fileDeleteFailures: z.number(),
  }),
})

export const PhotoSyncStatusSchema = z.object({
  running: z.boolean(),
  lastRunStartedAt: z.string().nullable(),
  lastRunFinishedAt: z.string().nullable(),
  lastResult: PhotoSyncResultSchema.nullable(),
})

export type PhotoSyncResultResponse = z.infer<typeof PhotoSyncResultSchema>
export type PhotoSyncStatusResponse = z.infer<typeof PhotoSyncStatusSchema>

// Re-export shared schemas
export { ErrorSchema }
