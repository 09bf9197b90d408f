import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  type IConfig,
  loadConfig,
} from "@stowage/config"
import { z } from "zod"
import type { Cache } from "../../ports/cache"
import { cacheEvictionPolicies } from "../../ports/cache-eviction-policy"
import type { CacheDeps } from "../../ports/cache-options"
import type { KeyHasher } from "../../ports/key-hasher"
import { createCache } from "../create-cache"

export const cacheConfigSchema = z.object({
  CACHE_POLICY: z.enum(cacheEvictionPolicies).default("lru"),
  CACHE_CAPACITY: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(1000),
  CACHE_NAME: z.string().min(1).optional(),
})

export type CacheConfig = z.infer<typeof cacheConfigSchema>

export const CACHE_ENV_PREFIX = "STOWAGE_"

export type LoadCacheConfigOptions = {
  /**
   * A `.env` file read before the environment. Only its `STOWAGE_` keys are
   * used, and the environment wins on conflicts. The file must exist.
   */
  envFile?: string

  /** Base directory for a relative `envFile`. */
  cwd?: string

  /** @default process.env */
  env?: Record<string, string | undefined>

  /** Replaces the file and environment sources entirely. */
  sources?: ConfigSource[]
}

function defaultSources(options: LoadCacheConfigOptions): ConfigSource[] {
  const env = new EnvSource({ prefix: CACHE_ENV_PREFIX, env: options.env })
  if (options.envFile === undefined) return [env]

  const file = new DotenvSource({
    path: options.envFile,
    prefix: CACHE_ENV_PREFIX,
    cwd: options.cwd,
  })

  return [file, env]
}

/**
 * Load cache settings from `STOWAGE_CACHE_*` keys in an optional `.env` file
 * and the process environment.
 *
 * @throws ConfigValidationError
 */
export async function loadCacheConfig(
  options: LoadCacheConfigOptions = {},
): Promise<IConfig<CacheConfig>> {
  const sources = options.sources ?? defaultSources(options)

  return loadConfig({ schema: cacheConfigSchema, sources })
}

export function createCacheFromConfig<K, V>(
  config: CacheConfig,
  deps: CacheDeps = {},
  hasher?: KeyHasher<K>,
): Cache<K, V> {
  return createCache<K, V>(
    config.CACHE_POLICY,
    {
      capacity: config.CACHE_CAPACITY,
      ...(hasher !== undefined && { hasher }),
      ...(config.CACHE_NAME !== undefined && { name: config.CACHE_NAME }),
    },
    deps,
  )
}
