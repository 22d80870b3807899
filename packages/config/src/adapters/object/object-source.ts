import type { ConfigSource } from "../../ports/source"

/**
 * In-memory values, typically programmatic overrides applied after env.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Record<string, unknown>,
    name = "object:overrides",
  ) {
    this.name = name
  }

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
