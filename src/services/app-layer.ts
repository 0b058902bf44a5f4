import { Layer } from "effect"
import { makeAppConfigProviderLayer } from "./config-provider"
import { LoggerLive } from "./logger"
import { type SyncConfigOverrides, makeSyncConfigLayer } from "./sync-config"
import { SyncServiceLive } from "./sync-service"

export interface AppLayerOptions {
  /** Engine constants overriding the defaults */
  readonly sync?: SyncConfigOverrides
  /** Config entries read before the environment (e.g. LOG_LEVEL from a flag) */
  readonly config?: Readonly<Record<string, string | undefined>>
}

export const makeAppLayer = (options: AppLayerOptions = {}) =>
  Layer.mergeAll(
    LoggerLive.pipe(Layer.provide(makeAppConfigProviderLayer(options.config ?? {}))),
    SyncServiceLive.pipe(Layer.provide(makeSyncConfigLayer(options.sync ?? {}))),
  )

export const AppLayer = makeAppLayer()
