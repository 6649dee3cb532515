import { Request, Response } from 'express';

export type MockNext = jest.Mock<void, [unknown?]>;

/**
 * Create a mock request object for testing
 */
export function createMockRequest(overrides: Partial<Request> = {}): Partial<Request> {
  return {
    body: {},
    query: {},
    params: {},
    headers: {},
    ...overrides,
  };
}

/**
 * Create a mock response object for testing
 */
export function createMockResponse(): Partial<Response> {
  return {};
}

/**
 * Create a mock NextFunction
 */
export function createMockNext(): MockNext {
  return jest.fn<void, [unknown?]>();
}

/**
 * First argument of the first call to next, if any
 */
export function getMockNextError(mockNext: MockNext): unknown {
  const firstCall = mockNext.mock.calls[0];
  return firstCall?.[0];
}
