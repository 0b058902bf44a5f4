import { ConfigProvider, Layer } from "effect"

/**
 * Config provider that reads explicit entries (e.g. parsed CLI flags) first
 * and falls back to the process environment.
 */
export const makeAppConfigProvider = (entries: Readonly<Record<string, string | undefined>>) => {
  const entryMap = new Map(
    Object.entries(entries).flatMap(([key, value]) =>
      typeof value === "string" ? [[key, value] as const] : [],
    ),
  )

  return ConfigProvider.orElse(ConfigProvider.fromMap(entryMap), () => ConfigProvider.fromEnv())
}

export const makeAppConfigProviderLayer = (entries: Readonly<Record<string, string | undefined>>) =>
  Layer.setConfigProvider(makeAppConfigProvider(entries))
