import { createInterface, type Interface } from "node:readline"

/**
 * Writes prompts to `output` and reads answers line by line from `input`.
 * `ask` resolves to `undefined` once input is exhausted.
 */
export class LinePrompter {
  private readonly rl: Interface
  private readonly lines: AsyncIterator<string>

  constructor(
    input: NodeJS.ReadableStream,
    private readonly output: NodeJS.WritableStream,
  ) {
    this.rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY, terminal: false })
    this.lines = this.rl[Symbol.asyncIterator]()
  }

  print(line: string): void {
    this.output.write(`${line}\n`)
  }

  async ask(prompt: string): Promise<string | undefined> {
    this.output.write(prompt)

    const next = await this.lines.next()

    return next.done ? undefined : next.value
  }

  close(): void {
    this.rl.close()
  }
}
