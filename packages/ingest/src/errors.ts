export class SourceUnavailableError extends Error {
  readonly path: string;

  constructor(path: string, options?: ErrorOptions) {
    super(`${path} not found or unreadable. Please ensure the file is in the project directory.`, options);
    this.name = "SourceUnavailableError";
    this.path = path;
  }
}

export class SourceFormatError extends Error {
  readonly missing: string[];

  constructor(message: string, missing: string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceFormatError";
    this.missing = missing;
  }
}
