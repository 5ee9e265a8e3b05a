import type { Logger } from "pino"

import type { KeeperCommand, ParsedCommand } from "./command.js"

type CommandHandler = (logger: Logger, parsed: ParsedCommand) => Promise<unknown>

type CommandHandlers = Record<KeeperCommand, CommandHandler>

export const runCommand = async (
  parsed: ParsedCommand,
  logger: Logger,
  handlers: CommandHandlers
): Promise<void> => {
  await handlers[parsed.command](logger, parsed)
}
