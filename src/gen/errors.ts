export class WorldGenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WorldGenError";
  }
}

export class ConfigurationError extends WorldGenError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/** Raised when the road network cannot be triangulated. */
export class GeometryError extends WorldGenError {
  constructor(message: string) {
    super(message);
    this.name = "GeometryError";
  }
}
