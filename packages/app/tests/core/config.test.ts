import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { resolveConfig } from "../../src/core/config.js"

const noFlags = { maxDepth: undefined, allowEmptyObject: undefined }

describe("resolveConfig", () => {
  it.effect("falls back to parser defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(noFlags, undefined)).toEqual({ maxDepth: 512, allowEmptyObject: false })
      expect(resolveConfig(noFlags, {})).toEqual({ maxDepth: 512, allowEmptyObject: false })
    }))

  it.effect("prefers the config file over defaults", () =>
    Effect.sync(() => {
      expect(resolveConfig(noFlags, { maxDepth: 8, allowEmptyObject: true })).toEqual({
        maxDepth: 8,
        allowEmptyObject: true
      })
    }))

  it.effect("prefers CLI flags over the config file", () =>
    Effect.sync(() => {
      expect(
        resolveConfig({ maxDepth: 4, allowEmptyObject: false }, { maxDepth: 8, allowEmptyObject: true })
      ).toEqual({ maxDepth: 4, allowEmptyObject: false })
    }))

  it.effect("caps the depth limit from a config file", () =>
    Effect.sync(() => {
      expect(resolveConfig(noFlags, { maxDepth: 5000 })).toEqual({ maxDepth: 1024, allowEmptyObject: false })
    }))
})
