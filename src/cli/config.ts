export interface CliConfig {
  // Required in front of the command keyword, for example '--help'; empty disables the check
  commandPrefix: string
  verbose: boolean
}

const readVerboseEnv = (): boolean => {
  const value = (process.env.KMD_VERBOSE ?? '').toLowerCase()
  return value === '1' || value === 'true'
}

let current: CliConfig = {
  commandPrefix: '--',
  verbose: readVerboseEnv()
}

export function setCliConfig(patch: Partial<CliConfig>) {
  current = { ...current, ...patch }
}

export function getCliConfig(): CliConfig {
  return current
}
