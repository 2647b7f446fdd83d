import type { Response } from 'express';
import { z } from 'zod';
import { HttpError, getErrorStatus } from '../errors/http-error';
import { describeError, logger } from '../utils/logger';

export function sendError(res: Response, error: unknown, fallbackMessage: string) {
  if (error instanceof z.ZodError) {
    return res.status(400).json({
      success: false,
      error: 'Invalid request payload',
      details: error.flatten(),
    });
  }

  const status = getErrorStatus(error);
  if (status !== undefined && status < 500) {
    logger.warn(fallbackMessage, { status, error: describeError(error) });
    return res.status(status).json({
      success: false,
      error: describeError(error),
      ...(error instanceof HttpError && error.data !== undefined ? { details: error.data } : {}),
    });
  }

  logger.error(fallbackMessage, { error: describeError(error) });
  return res.status(status ?? 500).json({
    success: false,
    error: error instanceof HttpError ? error.message : fallbackMessage,
  });
}
