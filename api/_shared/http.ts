/**
 * Shared HTTP plumbing for the API handlers
 *
 * CORS, method checks, admin bearer auth, the lazily built service graph,
 * and the error response shape `{ error: { message, code, requestId, validationErrors? } }`.
 *
 * Files under `api/_shared` are not deployed as routes.
 */

import { timingSafeEqual } from 'node:crypto';

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import {
  type KnowledgeBaseErrorCode,
  type Logger,
  type Services,
  createLogger,
  createServices,
  isKnowledgeBaseError,
  loadAppConfig,
} from '@hr-assistant/lib';

// =============================================================================
// Error Responses
// =============================================================================

export interface ValidationError {
  /** Path to the field that failed validation */
  field: string;
  message: string;
  code: string;
}

export interface ErrorResponse {
  error: {
    message: string;
    code: string;
    requestId: string;
    validationErrors?: ValidationError[];
  };
}

export const STATUS_BY_CODE: Record<KnowledgeBaseErrorCode, number> = {
  INVALID_INPUT: 400,
  UNSUPPORTED_FORMAT: 400,
  NOT_FOUND: 404,
  ALREADY_INGESTED: 409,
  SCRAPE_FAILED: 502,
  GENERATION_FAILED: 502,
  STORAGE_FAILED: 502,
  UPSTREAM_TIMEOUT: 504,
};

export function sendError(
  res: VercelResponse,
  statusCode: number,
  message: string,
  code: string,
  requestId: string,
  validationErrors?: ValidationError[]
): void {
  const body: ErrorResponse = {
    error: {
      message,
      code,
      requestId,
      ...(validationErrors && { validationErrors }),
    },
  };
  res.status(statusCode).json(body);
}

export function transformZodErrors(error: z.ZodError): ValidationError[] {
  return error.errors.map((issue) => ({
    field: issue.path.join('.') || 'body',
    message: issue.message,
    code: `validation_${issue.code}`,
  }));
}

/**
 * Answer a failed request. Messages of upstream failures are only shown to
 * admin callers; public callers get a generic message.
 */
export function handleError(
  res: VercelResponse,
  error: unknown,
  requestId: string,
  logger: Logger,
  exposeUpstreamMessages: boolean
): void {
  if (error instanceof z.ZodError) {
    const validationErrors = transformZodErrors(error);
    const primary = validationErrors[0]?.message ?? 'Invalid request body';
    sendError(res, 400, primary, 'VALIDATION_ERROR', requestId, validationErrors);
    return;
  }

  if (isKnowledgeBaseError(error)) {
    const status = STATUS_BY_CODE[error.code];
    if (status >= 500) {
      logger.error('Request failed', error, { requestId, code: error.code });
    } else {
      logger.warn('Request rejected', { requestId, code: error.code, error: error.message });
    }

    const message =
      status < 500 || exposeUpstreamMessages
        ? error.message
        : status === 504
          ? 'Request timed out'
          : 'An error occurred while processing your request';
    sendError(res, status, message, error.code, requestId);
    return;
  }

  logger.error('Unexpected error', error, { requestId });
  sendError(res, 500, 'An unexpected error occurred', 'INTERNAL_ERROR', requestId);
}

// =============================================================================
// CORS & Auth
// =============================================================================

/**
 * The request origin when it is on the allowed list; there is no wildcard
 */
export function getAllowedOrigin(
  origin: string | undefined,
  allowedOrigins: readonly string[]
): string | null {
  if (origin && allowedOrigins.includes(origin)) {
    return origin;
  }
  return null;
}

function applyCors(
  req: VercelRequest,
  res: VercelResponse,
  methods: readonly string[],
  allowedOrigins: readonly string[]
): void {
  const allowedOrigin = getAllowedOrigin(req.headers.origin, allowedOrigins);
  if (!allowedOrigin) {
    return;
  }
  res.setHeader('Access-Control-Allow-Origin', allowedOrigin);
  res.setHeader('Access-Control-Allow-Methods', [...methods, 'OPTIONS'].join(', '));
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
  res.setHeader('Vary', 'Origin');
}

export type AuthResult = { ok: true } | { ok: false; status: number; code: string; message: string };

/**
 * Check `Authorization: Bearer <ADMIN_API_KEY>`. Admin routes are closed
 * while no key is configured.
 */
export function checkAdminAuth(
  authorization: string | undefined,
  adminApiKey: string | undefined
): AuthResult {
  if (!adminApiKey) {
    return {
      ok: false,
      status: 503,
      code: 'ADMIN_DISABLED',
      message: 'Admin API is not configured',
    };
  }

  const match = /^Bearer\s+(.+)$/i.exec(authorization ?? '');
  const token = match?.[1]?.trim();
  if (!token || !safeEqual(token, adminApiKey)) {
    return { ok: false, status: 401, code: 'UNAUTHORIZED', message: 'Invalid or missing admin token' };
  }
  return { ok: true };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && timingSafeEqual(left, right);
}

// =============================================================================
// Service Graph
// =============================================================================

let servicesInstance: Services | null = null;

/**
 * Build the service graph on first use from the platform environment
 *
 * @throws {z.ZodError} If the environment is not configured
 */
export function getServices(): Services {
  if (!servicesInstance) {
    servicesInstance = createServices(loadAppConfig());
  }
  return servicesInstance;
}

export function setServices(services: Services | null): void {
  servicesInstance = services;
}

// =============================================================================
// Handler Wrapper
// =============================================================================

export interface RequestContext {
  req: VercelRequest;
  res: VercelResponse;
  requestId: string;
  services: Services;
  logger: Logger;
}

export interface HandlerOptions {
  /** Route name used for request ids and log sources */
  name: string;
  methods: readonly string[];
  admin?: boolean;
}

export type VercelHandler = (req: VercelRequest, res: VercelResponse) => Promise<void>;

export function generateRequestId(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

export function createHandler(
  options: HandlerOptions,
  handle: (ctx: RequestContext) => Promise<void>
): VercelHandler {
  return async (req, res) => {
    const requestId = generateRequestId(options.name);

    let services: Services;
    try {
      services = getServices();
    } catch (error) {
      createLogger(`api:${options.name}`).error('Service configuration is invalid', error, { requestId });
      sendError(res, 500, 'Service is not configured', 'CONFIGURATION_ERROR', requestId);
      return;
    }
    const logger = services.logger.child(`api:${options.name}`);

    applyCors(req, res, options.methods, services.config.http.allowedOrigins);

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }

    if (!req.method || !options.methods.includes(req.method)) {
      res.setHeader('Allow', options.methods.join(', '));
      sendError(res, 405, 'Method not allowed', 'METHOD_NOT_ALLOWED', requestId);
      return;
    }

    if (options.admin) {
      const auth = checkAdminAuth(req.headers.authorization, services.config.http.adminApiKey);
      if (!auth.ok) {
        sendError(res, auth.status, auth.message, auth.code, requestId);
        return;
      }
    }

    try {
      await handle({ req, res, requestId, services, logger });
    } catch (error) {
      handleError(res, error, requestId, logger, options.admin === true);
    }
  };
}
