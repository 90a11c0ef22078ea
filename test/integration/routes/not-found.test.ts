import type { ErrorResponse } from '@schemas/common/error.schema.js'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

describe('Unknown routes', () => {
  it('should answer 404 naming the method and path', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/v1/albums?token=test-secret',
    })

    expect(response.statusCode).toBe(404)
    expect(response.json<ErrorResponse>()).toEqual({
      statusCode: 404,
      code: 'ROUTE_NOT_FOUND',
      error: 'Not Found',
      message: 'Route GET /v1/albums not found',
    })
  })
})
