// SPDX-License-Identifier: MIT

import type { RequestDecorator } from './types.js';

/**
 * Builds the value of a Basic `Authorization` header.
 * @returns `Basic ` followed by base64("login:password") of the UTF-8 bytes.
 */
export function basicAuthHeader(login: string, password: string): string {
  const token = Buffer.from(`${login}:${password}`, 'utf-8').toString('base64');
  return `Basic ${token}`;
}

/**
 * Decorator adding Basic authentication to every request.
 * The header is computed once, when the decorator is created.
 */
export function basicAuth(login: string, password: string): RequestDecorator {
  const authorization = basicAuthHeader(login, password);
  return (request) => ({
    ...request,
    headers: { ...request.headers, Authorization: authorization },
  });
}
