// Configuration-specific types
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader<T> {
  load(path: string): Promise<T>;
  validate(config: unknown): ConfigValidationResult;
}

/** Command-line values that override what the environment file declares */
export interface ConfigOverrides {
  force?: boolean;
}
