/**
 * Raised when scoring configuration or a model file cannot be used.
 * Fatal: a run must abort before any scoring.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
