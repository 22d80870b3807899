import { type ConfigSource, EnvSource, type IConfig, loadConfig } from "@attrmap/config"
import { logLevelNames } from "@attrmap/logger"
import { z } from "zod"
import { numberFallbacks } from "../ports/codec-options"

export const CODEC_ENV_PREFIX = "ATTRMAP_"

export const codecConfigSchema = z.object({
  NUMBER_FALLBACK: z.enum(numberFallbacks).default("lenient"),
  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type CodecConfig = z.output<typeof codecConfigSchema>

/**
 * Load codec settings, by default from `ATTRMAP_`-prefixed environment
 * variables (`ATTRMAP_NUMBER_FALLBACK`, `ATTRMAP_LOG_LEVEL`,
 * `ATTRMAP_LOG_PRETTY`).
 */
export async function loadCodecConfig(sources?: ConfigSource[]): Promise<IConfig<CodecConfig>> {
  return loadConfig<CodecConfig>({
    schema: codecConfigSchema,
    sources: sources ?? [new EnvSource({ prefix: CODEC_ENV_PREFIX })],
  })
}
