import { setupServer } from 'msw/node'
import { afterAll, afterEach, beforeAll } from 'vitest'

/**
 * MSW (Mock Service Worker) setup for Vitest
 *
 * Test files that talk to the Google endpoints import `server` and add their
 * own handlers with `server.use(...)`. Any request without a handler fails
 * the test, so nothing reaches the network.
 *
 * @see https://mswjs.io/docs/integrations/node
 */
export const server = setupServer()

beforeAll(() => {
  server.listen({ onUnhandledRequest: 'error' })
})

afterEach(() => {
  server.resetHandlers()
})

afterAll(() => {
  server.close()
})
