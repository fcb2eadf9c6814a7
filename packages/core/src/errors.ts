export class InvalidInputError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length === 0 ? message : `${message}: ${issues.join("; ")}`);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

export class UnknownModeError extends Error {
  readonly mode: string;

  constructor(mode: string) {
    super(`unknown analysis mode "${mode}" (expected discovery, investigation or expert)`);
    this.name = "UnknownModeError";
    this.mode = mode;
  }
}

export class InvalidConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length === 0 ? message : `${message}: ${issues.join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}
