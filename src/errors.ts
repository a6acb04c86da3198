export class KashStashError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = "KashStashError";
  }
}

export class InvalidEndpointError extends KashStashError {
  constructor(public readonly blankFields: readonly string[]) {
    super(`Endpoint is missing required fields: ${blankFields.join(", ")}`, "INVALID_ENDPOINT");
    this.name = "InvalidEndpointError";
  }
}

export class InvalidEndpointFieldError extends KashStashError {
  constructor(
    public readonly field: string,
    value: string,
    allowed: string,
  ) {
    super(`Invalid ${field} '${value}': only ${allowed} are allowed`, "INVALID_ENDPOINT");
    this.name = "InvalidEndpointFieldError";
  }
}

export class EndpointNotFoundError extends KashStashError {
  constructor(id: string) {
    super(`Endpoint not found: ${id}`, "ENDPOINT_NOT_FOUND");
    this.name = "EndpointNotFoundError";
  }
}

export class NoEndpointConfiguredError extends KashStashError {
  constructor() {
    super("No endpoint configured. Please set up an endpoint first.", "NO_ENDPOINT");
    this.name = "NoEndpointConfiguredError";
  }
}

export class InvalidParameterError extends KashStashError {
  constructor(message: string) {
    super(message, "INVALID_PARAMETER");
    this.name = "InvalidParameterError";
  }
}

export class UnsupportedImageError extends KashStashError {
  constructor(source: string) {
    super(`Unsupported image data in '${source}': expected PNG or JPEG`, "UNSUPPORTED_IMAGE");
    this.name = "UnsupportedImageError";
  }
}

export class FileReadError extends KashStashError {
  constructor(filePath: string, cause: string) {
    super(`Failed to read file '${filePath}': ${cause}`, "FILE_READ_ERROR");
    this.name = "FileReadError";
  }
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
