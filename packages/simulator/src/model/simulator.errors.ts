import { BaseError } from "@cachesim/errors"

export type SimulatorErrorCode =
  | "invalid_policy"
  | "invalid_capacity"
  | "invalid_key"
  | "invalid_value"
  | "invalid_option"

export class SimulatorError extends BaseError<SimulatorErrorCode> {
  static invalidPolicy(input: string): SimulatorError {
    return new SimulatorError(`Unknown cache policy choice: ${input}`, {
      code: "invalid_policy",
      context: { input },
    })
  }

  static invalidCapacity(input: string): SimulatorError {
    return new SimulatorError("Cache capacity must be a positive integer", {
      code: "invalid_capacity",
      context: { input },
    })
  }

  static invalidKey(input: string): SimulatorError {
    return new SimulatorError("Key must be an integer", {
      code: "invalid_key",
      context: { input },
    })
  }

  static invalidValue(input: string): SimulatorError {
    return new SimulatorError("Value must be a single non-empty word", {
      code: "invalid_value",
      context: { input },
    })
  }

  static invalidOption(input: string): SimulatorError {
    return new SimulatorError(`Unknown menu option: ${input}`, {
      code: "invalid_option",
      context: { input },
    })
  }
}
