import type { ConfigSource } from "../ports/source"

/** Programmatic overrides, typically applied last. */
export class ObjectSource implements ConfigSource {
  readonly name = "object:overrides"

  constructor(private readonly values: Record<string, unknown>) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
