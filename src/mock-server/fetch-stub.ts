/**
 * Routes the global fetch to an HttpMock for the duration of a test.
 * Restore with `jest.restoreAllMocks()` or the returned spy's `mockRestore()`.
 */

import { jest } from '@jest/globals';
import type { HttpMock } from './http-mock';

export function installFetchMock(mock: HttpMock) {
  return jest
    .spyOn(globalThis, 'fetch')
    .mockImplementation((input, init) => mock.handle(input, init));
}
