/**
 * Test helper utilities.
 *
 * @module @taskwire/test-utils/helpers
 */

// Effect test helpers
export {
  runEffect,
  runEffectEither,
  expectEffectFailure,
  type RunEffectOptions
} from "./effect.js"
