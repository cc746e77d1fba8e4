// Error types shared across the generator

export class ParseError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ParseError';
  }
}

export class TemplateError extends Error {
  constructor(message: string, readonly templatePath: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

export class DocumentNotFoundError extends Error {
  constructor(readonly filename: string) {
    super(`File not found: ${filename}`);
    this.name = 'DocumentNotFoundError';
  }
}

export class InvalidFilenameError extends Error {
  constructor(readonly filename: string) {
    super(`Invalid filename: ${filename}`);
    this.name = 'InvalidFilenameError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
