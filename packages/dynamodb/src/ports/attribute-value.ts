import type { AttributeValue } from "@aws-sdk/client-dynamodb"

export type { AttributeValue }

/**
 * A whole item: top-level attribute names to values.
 */
export type AttributeMap = Record<string, AttributeValue>
