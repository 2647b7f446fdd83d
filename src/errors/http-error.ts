export class HttpError extends Error {
  status?: number;
  data?: unknown;

  constructor(message: string, status?: number, data?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.data = data;
  }

  static badRequest(message: string, data?: unknown): HttpError {
    return new HttpError(message, 400, data);
  }

  static notFound(message: string): HttpError {
    return new HttpError(message, 404);
  }
}

export function getErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object' || !('status' in error)) return undefined;
  return typeof error.status === 'number' ? error.status : undefined;
}
