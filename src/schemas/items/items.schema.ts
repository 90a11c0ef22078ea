import { z } from 'zod'
import { ErrorSchema } from '@root/schemas/common/error.schema.js'

export const ItemRecordSchema = z.object({
  id: z.string(),
  filename: z.string(),
  localFolder: z.string(),
  isStarred: z.boolean(),
  inWindow: z.boolean(),
  albums: z.array(z.string()),
  creationTime: z.string().nullable(),
  // Folder the placement pass will move the file to; '' is the root
  desiredFolder: z.string(),
  retained: z.boolean(),
})

export const ItemListResponseSchema = z.object({
  total: z.number(),
  items: z.array(ItemRecordSchema),
})

export const ItemListQuerySchema = z.object({
  retained: z.enum(['true', 'false']).optional(),
})

export const ItemIdParamsSchema = z.object({
  id: z.string().min(1),
})

export type ItemRecordResponse = z.infer<typeof ItemRecordSchema>
export type ItemListResponse = z.infer<typeof ItemListResponseSchema>

// Re-export shared schemas
export { ErrorSchema }
