// Raised when a value that the pool program guarantees turns out not to hold.
// Seeing one of these means either the snapshot is corrupt or there is a bug.
export class InvariantViolationError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'InvariantViolationError'
  }
}

export class MaintenanceError extends Error {
  constructor (message: string) {
    super(message)
    this.name = 'MaintenanceError'
  }
}

export class SnapshotError extends Error {
  constructor (
    message: string,
    readonly url: string | null = null,
    readonly status: number | null = null,
  ) {
    super(url ? `${message} (${url}${status !== null ? `, status ${status}` : ''})` : message)
    this.name = 'SnapshotError'
  }
}

export class NoActiveValidatorsError extends Error {
  constructor () {
    super('Cannot compute target balances without any active validator')
    this.name = 'NoActiveValidatorsError'
  }
}

export function invariant (condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message)
  }
}
