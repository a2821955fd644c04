/**
 * Error Handler Plugin
 *
 * Maps thrown errors to JSON bodies of one shape:
 * { statusCode, error, message, code?, details? }
 */

import type { FastifyPluginAsync, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import { ZodError } from 'zod';
import { MeshWatchError } from '@meshwatch/core';

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
  code?: string;
  details?: unknown;
}

const STATUS_LABELS: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
};

const errorHandlerPlugin: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: FastifyError | MeshWatchError | ZodError, request: FastifyRequest, reply: FastifyReply) => {
    const { log } = request;

    if (error instanceof ZodError) {
      const apiError: ApiError = {
        statusCode: 400,
        error: 'Validation Error',
        message: 'Request validation failed',
        details: error.errors.map(e => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      };

      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(apiError);
    }

    if (error instanceof MeshWatchError) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: error.name,
        message: error.message,
        code: error.code,
        details: error.details,
      };

      if (error.statusCode >= 500) {
        log.error({ err: error }, 'Request failed');
      } else {
        log.warn({ err: error }, 'Client error');
      }
      return reply.status(error.statusCode).send(apiError);
    }

    // Fastify's own schema validation
    if (error.validation) {
      const apiError: ApiError = {
        statusCode: 400,
        error: 'Validation Error',
        message: 'Request validation failed',
        details: error.validation,
      };

      log.warn({ err: error }, 'Validation error');
      return reply.status(400).send(apiError);
    }

    if (error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
      const apiError: ApiError = {
        statusCode: error.statusCode,
        error: STATUS_LABELS[error.statusCode] ?? 'Bad Request',
        message: error.message,
        code: error.code,
      };

      log.warn({ err: error }, 'Client error');
      return reply.status(error.statusCode).send(apiError);
    }

    log.error({ err: error }, 'Internal server error');

    const apiError: ApiError = {
      statusCode: 500,
      error: 'Internal Server Error',
      message: process.env['NODE_ENV'] === 'production'
        ? 'An unexpected error occurred'
        : error.message,
    };

    return reply.status(500).send(apiError);
  });

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const apiError: ApiError = {
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
    };

    return reply.status(404).send(apiError);
  });
};

export const errorHandler = fp(errorHandlerPlugin, {
  name: 'error-handler',
});
