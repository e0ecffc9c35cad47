export class InvalidConfigurationError extends Error {
  issues: string[]

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'InvalidConfigurationError'
    this.issues = issues
  }
}

export class UnknownStrategyError extends Error {
  strategy: string

  constructor(strategy: string) {
    super(`Unknown strategy "${strategy}"`)
    this.name = 'UnknownStrategyError'
    this.strategy = strategy
  }
}
