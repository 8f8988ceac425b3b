import type { Request } from 'express';

import { ServiceError, UnsupportedMediaTypeError } from '../errors';
import { Logger, createLogger } from '../logger';

// The parts of express' Request/Response the controllers use.
export type HttpRequest = Pick<Request, 'params' | 'query' | 'body' | 'baseUrl'> & {
  is(type: string): string | false | null;
};

export interface HttpResponse {
  status(code: number): HttpResponse;
  json(body: unknown): unknown;
  location(url: string): HttpResponse;
  end(): unknown;
}

export interface ErrorBody {
  message: string;
}

const defaultLogger = createLogger('http');

function isBodyParserError(error: unknown): error is { type: string; status: number; message: string } {
  return typeof error === 'object'
    && error !== null
    && 'type' in error && typeof error.type === 'string'
    && 'status' in error && typeof error.status === 'number'
    && 'message' in error && typeof error.message === 'string';
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof ServiceError) {
    return { status: error.status, body: { message: error.message } };
  }
  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    const message = error.type === 'entity.parse.failed' ? 'Request body is not valid JSON' : error.message;
    return { status: error.status, body: { message } };
  }
  return { status: 500, body: { message: 'Internal server error' } };
}

export function sendError(res: HttpResponse, error: unknown, logger: Logger = defaultLogger): void {
  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    logger.error({ err: error }, 'Unhandled error while processing request');
  } else {
    logger.warn({ status, message: body.message }, 'Request rejected');
  }
  res.status(status).json(body);
}

export function requireJson(req: HttpRequest): void {
  if (!req.is('application/json')) {
    throw new UnsupportedMediaTypeError('Content-Type must be application/json');
  }
}

// express recognises error middleware by its four parameters
export function errorHandler(error: unknown, _req: unknown, res: HttpResponse, _next: unknown): void {
  sendError(res, error);
}

export function notFoundHandler(_req: unknown, res: HttpResponse): void {
  res.status(404).json({ message: 'Resource not found' });
}
