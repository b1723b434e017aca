export class PdfParseError extends Error {
  readonly code = 'PDF_PARSE_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PdfParseError';
  }
}

export class OutlineConfigError extends Error {
  readonly code = 'OUTLINE_CONFIG_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'OutlineConfigError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? ` (${error.cause.message})` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
};
