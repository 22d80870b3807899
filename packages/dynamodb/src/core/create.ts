import type { IConfig } from "@attrmap/config"
import { createPinoLogger, type PinoLoggerDeps } from "@attrmap/logger"
import type { CodecConfig } from "../config/codec-config"
import type { AttributeCodecOptions } from "../ports/codec-options"
import { AttributeCodec, type AttributeCodecDeps } from "./attribute-codec"

export function createAttributeCodec(
  deps: AttributeCodecDeps = {},
  opts: Partial<AttributeCodecOptions> = {},
): AttributeCodec {
  return new AttributeCodec(deps, opts)
}

/**
 * Build a codec from loaded configuration, logging through pino.
 */
export function createAttributeCodecFromConfig(
  config: IConfig<CodecConfig>,
  loggerDeps: PinoLoggerDeps = {},
): AttributeCodec {
  const logger = createPinoLogger(loggerDeps, {
    level: config.get("LOG_LEVEL"),
    prettify: config.get("LOG_PRETTY"),
  })

  return new AttributeCodec({ logger }, { numberFallback: config.get("NUMBER_FALLBACK") })
}
