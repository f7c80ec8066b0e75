export class InvalidUrlError extends Error {
  constructor(
    readonly input: string,
    reason: string,
  ) {
    super(`Invalid database URL "${input}": ${reason}`)
    this.name = "InvalidUrlError"
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConfigError"
  }
}

export class ProbeTransportError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ProbeTransportError"
  }
}

export class InterruptedError extends Error {
  constructor(message = "Check cancelled by user") {
    super(message)
    this.name = "InterruptedError"
  }
}
