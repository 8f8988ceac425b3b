import { describe, test, expect } from '@jest/globals';

import { NotFoundError, ServiceError, UnsupportedMediaTypeError, ValidationError } from '../../errors';
import { errorHandler, notFoundHandler, requireJson, sendError, toErrorResponse } from '../respond';
import { jsonRequest, mockRequest, mockResponse, sentBody } from './mocks';

describe('toErrorResponse', () => {
  test('uses the status carried by service errors', () => {
    expect(toErrorResponse(new ValidationError('bad input'))).toEqual({ status: 400, body: { message: 'bad input' } });
    expect(toErrorResponse(new NotFoundError('missing'))).toEqual({ status: 404, body: { message: 'missing' } });
    expect(toErrorResponse(new UnsupportedMediaTypeError('json only'))).toEqual({ status: 415, body: { message: 'json only' } });
    expect(toErrorResponse(new ServiceError('teapot', 418))).toEqual({ status: 418, body: { message: 'teapot' } });
  });

  test('maps body parser failures to client errors', () => {
    const parseFailure = Object.assign(new SyntaxError('Unexpected token } in JSON'), {
      type: 'entity.parse.failed',
      status: 400,
    });
    const tooLarge = Object.assign(new Error('request entity too large'), { type: 'entity.too.large', status: 413 });

    expect(toErrorResponse(parseFailure)).toEqual({ status: 400, body: { message: 'Request body is not valid JSON' } });
    expect(toErrorResponse(tooLarge)).toEqual({ status: 413, body: { message: 'request entity too large' } });
  });

  test('hides anything else behind a 500', () => {
    expect(toErrorResponse(new Error('secret detail'))).toEqual({ status: 500, body: { message: 'Internal server error' } });
    expect(toErrorResponse('oops')).toEqual({ status: 500, body: { message: 'Internal server error' } });
  });
});

describe('sendError', () => {
  test('writes the mapped status and body', () => {
    const res = mockResponse();
    sendError(res, new NotFoundError('gone'));

    expect(res.status).toHaveBeenCalledWith(404);
    expect(sentBody(res)).toEqual({ message: 'gone' });
  });
});

describe('requireJson', () => {
  test('passes JSON requests through', () => {
    expect(() => requireJson(jsonRequest({}))).not.toThrow();
  });

  test('rejects other content types with 415', () => {
    expect(() => requireJson(mockRequest())).toThrow(
      new UnsupportedMediaTypeError('Content-Type must be application/json'),
    );
  });
});

describe('express handlers', () => {
  test('errorHandler answers with the mapped error', () => {
    const res = mockResponse();
    errorHandler(new ValidationError('nope'), mockRequest(), res, () => undefined);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(sentBody(res)).toEqual({ message: 'nope' });
  });

  test('notFoundHandler answers 404', () => {
    const res = mockResponse();
    notFoundHandler(mockRequest(), res);

    expect(res.status).toHaveBeenCalledWith(404);
    expect(sentBody(res)).toEqual({ message: 'Resource not found' });
  });
});
