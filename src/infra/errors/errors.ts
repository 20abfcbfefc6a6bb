export class StdHumanError extends Error {
  constructor(message: string) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ConfigurationError extends StdHumanError {
  constructor(message: string, public readonly key?: string) {
    super(key ? `[${key}] ${message}` : message)
  }
}

export class DeliveryError extends StdHumanError {
  constructor(
    public readonly destination: string,
    message: string,
  ) {
    super(`[chat:${destination}] ${message}`)
  }
}

export class LockError extends StdHumanError {
  constructor(
    public readonly resource: string,
    message: string,
  ) {
    super(`[lock:${resource}] ${message}`)
  }
}

export class StorageError extends StdHumanError {
  constructor(
    public readonly store: string,
    message: string,
  ) {
    super(`[store:${store}] ${message}`)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
