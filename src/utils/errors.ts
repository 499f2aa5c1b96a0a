/** Input file (catalog, plan, annotations, descriptions) is missing, unparsable or the wrong shape. */
export class InvalidInputError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** No usable source videos: planning cannot start. */
export class EmptyCatalogError extends Error {
  constructor(message = 'No valid videos found in the catalog') {
    super(message);
    this.name = 'EmptyCatalogError';
  }
}

/** Planner options or credentials are invalid for the requested stage. */
export class ConfigError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
