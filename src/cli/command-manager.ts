import { getCliConfig } from "./config"

export interface Command {
  // Keyword variants without the prefix, for example ['help', 'h']
  primary: string[]
  description: string
  // Total parameter count including the command keyword itself
  paramCount: number
  run: (params: string[]) => number
}

export class CommandManager {
  private commands: Command[] = []

  addCommand(command: Command): boolean {
    if (command.primary.length === 0) {
      console.error("❌ Cannot add a command without a primary keyword")
      return false
    }
    const clash = command.primary.find((p) => this.findCommand(p) !== undefined)
    if (clash !== undefined) {
      console.error(`❌ Command '${clash}' already exists`)
      return false
    }
    this.commands.push(command)
    return true
  }

  getCommands(): readonly Command[] {
    return this.commands
  }

  findCommand(keyword: string): Command | undefined {
    return this.commands.find((c) => c.primary.includes(keyword))
  }

  // Returns the process exit code
  parseCommand(params: string[]): number {
    if (params.length === 0) {
      console.error("❌ No command given, try '--help'")
      return 1
    }

    const { commandPrefix } = getCliConfig()
    const [first, ...rest] = params

    if (commandPrefix && !first.startsWith(commandPrefix)) {
      console.error(`❌ Target command '${first}' is missing required prefix '${commandPrefix}'!`)
      return 1
    }

    const keyword = first.slice(commandPrefix.length)
    const command = this.findCommand(keyword)
    if (!command) {
      console.error(`❌ Inserted command '${keyword}' does not exist!`)
      return 1
    }

    if (params.length !== command.paramCount) {
      console.error(
        `❌ Command '${keyword}' takes ${command.paramCount - 1} parameter(s), got ${params.length - 1}`
      )
      return 1
    }

    return command.run([keyword, ...rest])
  }
}
