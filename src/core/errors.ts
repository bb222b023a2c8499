export class ThermolineError extends Error {
  suggestions: string[];

  constructor(message: string, suggestions: string[] = []) {
    super(message);
    this.name = 'ThermolineError';
    this.suggestions = suggestions;
  }
}

/**
 * Raised when user or environment configuration fails validation
 */
export class ConfigError extends ThermolineError {
  /**
   * Dotted paths of the offending settings, e.g. `chart.maxWidth`
   */
  paths: string[];

  constructor(message: string, paths: string[] = []) {
    super(message, [
      'Check the configuration keys against the documented defaults.',
      'Unset THERMOLINE_* environment variables to fall back to defaults.',
    ]);
    this.name = 'ConfigError';
    this.paths = paths;
  }
}
