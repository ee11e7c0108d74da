/**
 * Raised while building configuration, before any document is processed.
 * The only failure allowed to stop a run.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly missing: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
