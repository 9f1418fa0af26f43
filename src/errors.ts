/**
 * Thrown by the panic entry points after the message has been written at FATAL.
 */
export class LogPanic extends Error {
  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}

/**
 * Raised when a logging configuration cannot be parsed or validated.
 */
export class ConfigError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${source}: ${message}` : message);
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = new.target.name;
  }
}
