import { BaseError, type BaseErrorOptions } from "@attrmap/errors"

type CodecErrorOptions<C extends Lowercase<string>> = Omit<BaseErrorOptions<C>, "code">

/**
 * The serializer could not turn a typed value into a generic value.
 */
export class SerializationError extends BaseError<"serialization_error"> {
  constructor(message: string, options: CodecErrorOptions<"serialization_error"> = {}) {
    super(message, { ...options, code: "serialization_error" })
  }
}

/**
 * A decoded generic value does not have the shape the serializer expects.
 */
export class DeserializationError extends BaseError<"deserialization_error"> {
  constructor(message: string, options: CodecErrorOptions<"deserialization_error"> = {}) {
    super(message, { ...options, code: "deserialization_error" })
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message

  return typeof cause === "string" ? cause : "non-error value thrown"
}
