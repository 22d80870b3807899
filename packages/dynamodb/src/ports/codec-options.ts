/**
 * What `fromStoreValue` returns for `N` text that is not a number it can
 * represent (malformed, or outside both the 64-bit integer and double range).
 *
 * - `"lenient"`: the original text as a string. The content survives, only
 *   the type tag changes, so re-encoding yields `S`, not `N`.
 * - `"strict"`: `null`.
 */
export type NumberFallback = "lenient" | "strict"

export const numberFallbacks = ["lenient", "strict"] as const satisfies readonly NumberFallback[]

export type AttributeCodecOptions = {
  /** @default "lenient" */
  numberFallback: NumberFallback
}
