export class SimulationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SimulationError'
  }
}

export class ConfigurationError extends SimulationError {
  readonly issues: string[]

  constructor(issues: string[], cause?: unknown) {
    super(
      `Invalid simulation configuration:\n  - ${issues.join('\n  - ')}`,
      cause instanceof Error ? { cause } : undefined
    )
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

export class EmptyInventoryError extends SimulationError {
  constructor() {
    super('Cannot draw from an empty inventory')
    this.name = 'EmptyInventoryError'
  }
}

export class InsufficientDataError extends SimulationError {
  constructor(message: string) {
    super(message)
    this.name = 'InsufficientDataError'
  }
}
