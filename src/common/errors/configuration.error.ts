/**
 * Raised at construction time when a component is given settings it cannot run with.
 * Not recoverable: the process should fail to start.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
