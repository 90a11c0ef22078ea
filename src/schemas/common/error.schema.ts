import { z } from 'zod'

/** Body of every non-2xx response, whatever route or plugin produced it */
export const ErrorSchema = z.object({
  statusCode: z.number().int(),
  code: z.string(),
  error: z.string(),
  message: z.string().min(1),
})

export type ErrorResponse = z.infer<typeof ErrorSchema>
