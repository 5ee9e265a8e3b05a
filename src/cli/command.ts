import { Command, CommanderError, InvalidArgumentError } from "commander"

export type KeeperCommand = "migrate" | "serve"

export type ParsedCommand = {
  command: KeeperCommand
  /** Schema revision for `migrate`; null applies every revision. */
  target: string | null
}

const VALID_COMMANDS: readonly KeeperCommand[] = ["migrate", "serve"]

const isKeeperCommand = (value: string): value is KeeperCommand => {
  return VALID_COMMANDS.some((command) => command === value)
}

/**
 * Parses runtime arguments: `keeper [command] [target]`, defaulting to `serve`.
 *
 * @param argv Raw user arguments from process argv.
 * @returns Supported command plus its optional target.
 */
export const parseCommand = (argv: string[]): ParsedCommand => {
  const parser = new Command()

  parser
    .name("keeper")
    .exitOverride()
    .configureOutput({ writeErr: () => undefined })
    .allowUnknownOption(false)
    .allowExcessArguments(false)
    .argument("[command]", "runtime command", (value: string) => {
      if (!isKeeperCommand(value)) {
        throw new InvalidArgumentError(
          `Unknown command: ${value}. Valid commands: ${VALID_COMMANDS.join(", ")}`
        )
      }

      return value
    })
    .argument("[target]", "schema revision for migrate")

  try {
    parser.parse(argv, { from: "user" })
  } catch (error) {
    if (error instanceof CommanderError) {
      throw new Error(error.message)
    }

    if (error instanceof Error) {
      throw error
    }

    throw new Error("Unknown command parsing error")
  }

  const [commandArgument = "serve", target] = parser.args

  if (!isKeeperCommand(commandArgument)) {
    throw new Error(`Unknown command: ${commandArgument}`)
  }

  if (target !== undefined && commandArgument !== "migrate") {
    throw new Error(`Command ${commandArgument} does not take a target`)
  }

  return {
    command: commandArgument,
    target: target ?? null,
  }
}
