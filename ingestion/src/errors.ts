/** Raised when an input file cannot be read, parsed or validated. Always aborts the run. */
export class InputFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InputFileError";
    this.path = path;
  }
}

export function inputFileError(path: string, message: string, cause?: unknown): InputFileError {
  return new InputFileError(path, message, { cause });
}
