export type FramerErrorCode =
  | 'CONFIG_ERROR'
  | 'DIRECTORY_ERROR'
  | 'CLASSIFICATION_ERROR'
  | 'PIPELINE_ERROR';

export class FramerError extends Error {
  constructor(
    message: string,
    public readonly code: FramerErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FramerError';
  }
}

export class ConfigError extends FramerError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIG_ERROR', { issues });
    this.name = 'ConfigError';
  }
}

export class DirectoryError extends FramerError {
  constructor(message: string, public readonly directory: string) {
    super(message, 'DIRECTORY_ERROR', { directory });
    this.name = 'DirectoryError';
  }
}

export class ClassificationError extends FramerError {
  constructor(message: string, public readonly width: number, public readonly height: number) {
    super(message, 'CLASSIFICATION_ERROR', { width, height });
    this.name = 'ClassificationError';
  }
}

export class PipelineError extends FramerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PIPELINE_ERROR', context);
    this.name = 'PipelineError';
  }
}

export function isFramerError(error: unknown): error is FramerError {
  return error instanceof FramerError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
