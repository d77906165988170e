import { logger } from './logger';

export type ImageServiceErrorCode = 'INVALID_QUERY' | 'INVALID_COUNT';

export class ImageServiceError extends Error {
  constructor(
    message: string,
    public code: ImageServiceErrorCode,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = 'ImageServiceError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof ImageServiceError) {
    logger.warn(`[${context}] ${error.code}: ${error.message}`);
    return;
  }

  logger.error(`[${context}] Unexpected error: ${describeError(error)}`);
  if (error instanceof Error && error.stack) {
    logger.debug(`[${context}] Stack trace: ${error.stack}`);
  }
}
