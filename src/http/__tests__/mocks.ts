import { jest } from '@jest/globals';

import { HttpRequest, HttpResponse } from '../respond';

export function mockRequest(overrides: Partial<HttpRequest> = {}): HttpRequest {
  return {
    params: {},
    query: {},
    body: undefined,
    baseUrl: '/api/recommendations',
    is: () => false,
    ...overrides,
  };
}

export function jsonRequest(body: unknown, overrides: Partial<HttpRequest> = {}): HttpRequest {
  return mockRequest({
    body,
    is: type => (type === 'application/json' ? 'application/json' : false),
    ...overrides,
  });
}

export function mockResponse() {
  const res = {
    status: jest.fn<HttpResponse['status']>(),
    json: jest.fn<HttpResponse['json']>(),
    location: jest.fn<HttpResponse['location']>(),
    end: jest.fn<HttpResponse['end']>(),
  };
  res.status.mockReturnValue(res);
  res.location.mockReturnValue(res);
  return res;
}

// body passed to the last json() call
export function sentBody(res: ReturnType<typeof mockResponse>): unknown {
  const calls = res.json.mock.calls;
  return calls.length > 0 ? calls[calls.length - 1][0] : undefined;
}
