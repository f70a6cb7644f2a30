/**
 * Vitest Global Setup
 *
 * Starts the in-process HTTP server every SDK test talks to. Requests to
 * any route a test has not registered fail the test.
 *
 * Tests DO NOT need their own beforeAll/afterEach/afterAll for the server.
 * Just import { mockServer, mockRoute } from '@taskwire/test-utils' and add routes.
 */

import { beforeAll, afterEach, afterAll } from "vitest"
import { mockServer } from "@taskwire/test-utils"

beforeAll(() => {
  mockServer.listen({ onUnhandledRequest: "error" })
})

// Drop routes added by a test
afterEach(() => {
  mockServer.resetHandlers()
})

afterAll(() => {
  mockServer.close()
})
