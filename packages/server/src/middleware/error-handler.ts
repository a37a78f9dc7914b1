import type { ErrorHandler, MiddlewareHandler } from 'hono';
import { ZodError } from 'zod';
import type { SamlVariables } from '../types/hono.js';
import { SamlAuthError } from '../errors/saml-error.js';
import { ERROR_INVALID_REQUEST } from '../errors/error-codes.js';
import {
  HEADER_CACHE_CONTROL,
  HEADER_PRAGMA,
  NO_CACHE_PRAGMA,
  NO_STORE_CACHE_CONTROL,
} from '../config/constants.js';

/**
 * Global error handler for SAML errors
 *
 * Transforms errors into `{ error, error_description }` responses
 */
export const samlErrorHandler: ErrorHandler<{ Variables: SamlVariables }> = (err, c) => {
  console.error('SAML Error:', err);

  // Set no-cache headers for error responses
  c.header(HEADER_CACHE_CONTROL, NO_STORE_CACHE_CONTROL);
  c.header(HEADER_PRAGMA, NO_CACHE_PRAGMA);

  if (err instanceof SamlAuthError) {
    return c.json(err.toJSON(), err.statusCode);
  }

  // Handle Zod validation errors
  if (err instanceof ZodError) {
    const messages = err.errors.map((e) => e.message).join(', ') || 'Validation failed';

    return c.json(
      {
        error: ERROR_INVALID_REQUEST,
        error_description: messages,
      },
      400
    );
  }

  // Handle unexpected errors
  const serverError = SamlAuthError.serverError(
    process.env['NODE_ENV'] === 'production' ? 'An unexpected error occurred' : err.message
  );

  return c.json(serverError.toJSON(), 500);
};

/**
 * Security headers middleware
 */
export function securityHeaders(): MiddlewareHandler<{ Variables: SamlVariables }> {
  return async (c, next) => {
    await next();

    // Prevent clickjacking
    c.header('X-Frame-Options', 'DENY');

    // Prevent MIME type sniffing
    c.header('X-Content-Type-Options', 'nosniff');

    // Referrer policy; the login redirect carries the AuthnRequest in its URL
    c.header('Referrer-Policy', 'no-referrer');

    // Strict Transport Security (enable in production with HTTPS)
    if (process.env['NODE_ENV'] === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
  };
}

/**
 * Request logging middleware
 */
export function requestLogger(): MiddlewareHandler<{ Variables: SamlVariables }> {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;

    // Don't log sensitive data
    console.log(
      JSON.stringify({
        timestamp: new Date().toISOString(),
        method,
        path,
        status,
        duration,
        idp: c.get('idp'),
      })
    );
  };
}
