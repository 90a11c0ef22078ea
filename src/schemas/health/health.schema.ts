import { z } from 'zod'

const CheckStatusSchema = z.enum(['ok', 'failed'])

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  timestamp: z.string().datetime(),
  checks: z.object({
    database: CheckStatusSchema,
    photosDir: CheckStatusSchema,
  }),
})

export type HealthCheckStatus = z.infer<typeof CheckStatusSchema>
export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
