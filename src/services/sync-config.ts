import { InvalidSyncConfigError } from "@/lib/errors"
import { DEFAULT_SYNC_CONFIG, type SyncConfigValues } from "@/lib/sync"
import { Context, Effect, Layer } from "effect"

export class SyncConfig extends Context.Tag("SyncConfig")<SyncConfig, SyncConfigValues>() {}

export type SyncConfigOverrides = Partial<SyncConfigValues>

const keys = [
  "minLineDuration",
  "globalOffsetThreshold",
  "windowMargin",
  "minTokenLength",
  "defaultLineGap",
  "lastLineDuration",
  "minGapDuration",
] as const satisfies ReadonlyArray<keyof SyncConfigValues>

/**
 * Merge overrides onto the defaults, rejecting values the engine cannot use:
 * every constant must be a finite, non-negative number, the token length an
 * integer and the minimum line duration strictly positive.
 */
export const makeSyncConfig = (
  overrides: SyncConfigOverrides = {},
): Effect.Effect<SyncConfigValues, InvalidSyncConfigError> =>
  Effect.gen(function* () {
    const config: SyncConfigValues = { ...DEFAULT_SYNC_CONFIG, ...overrides }

    for (const key of keys) {
      const value = config[key]
      if (!Number.isFinite(value) || value < 0) {
        return yield* Effect.fail(
          new InvalidSyncConfigError({
            key,
            value,
            message: "must be a finite, non-negative number",
          }),
        )
      }
    }

    if (!Number.isInteger(config.minTokenLength)) {
      return yield* Effect.fail(
        new InvalidSyncConfigError({
          key: "minTokenLength",
          value: config.minTokenLength,
          message: "must be an integer",
        }),
      )
    }

    if (config.minLineDuration === 0) {
      return yield* Effect.fail(
        new InvalidSyncConfigError({
          key: "minLineDuration",
          value: config.minLineDuration,
          message: "must be greater than zero",
        }),
      )
    }

    return config
  })

export const SyncConfigLive = Layer.succeed(SyncConfig, DEFAULT_SYNC_CONFIG)

export const makeSyncConfigLayer = (overrides: SyncConfigOverrides) =>
  Layer.effect(SyncConfig, makeSyncConfig(overrides))
