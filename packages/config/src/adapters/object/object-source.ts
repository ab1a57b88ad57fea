import type { ConfigSource } from "../../ports/source"

/**
 * In-memory values, typically explicit overrides applied last.
 */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly obj: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.obj }
  }
}
