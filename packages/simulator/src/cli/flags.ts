import { parseArgs } from "node:util"

/**
 * Parses `--policy` / `-p` and `--capacity` / `-c` into config keys.
 * Unknown flags throw.
 */
export function parseFlags(argv: string[]): Record<string, string | undefined> {
  const { values } = parseArgs({
    args: argv,
    options: {
      policy: { type: "string", short: "p" },
      capacity: { type: "string", short: "c" },
    },
    strict: true,
    allowPositionals: false,
  })

  return {
    POLICY: values.policy,
    CAPACITY: values.capacity,
  }
}
