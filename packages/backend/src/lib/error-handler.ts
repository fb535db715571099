import { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  WorkflowError,
  ConflictError,
  UnauthorizedError,
  IdempotencyKeyRequiredError,
  ApplyFailureError,
} from './errors.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  code?: string;
  details?: unknown;
}

export function registerErrorHandler(fastify: FastifyInstance): void {
  fastify.setErrorHandler((error: FastifyError | Error, request, reply) => {
    const response: ErrorResponse = {
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      statusCode: 500,
    };

    if (error instanceof ZodError) {
      response.error = 'Validation Error';
      response.message = 'Request validation failed';
      response.statusCode = 400;
      response.code = 'validation_error';
      response.details = error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    // Handle custom errors
    if (error instanceof NotFoundError) {
      response.error = 'Not Found';
      response.message = error.message;
      response.statusCode = 404;
      response.code = error.code;
      return reply.status(404).send(response);
    }

    // Covers ValidationFailedError (400) and the 422 partial submission errors
    if (error instanceof ValidationError) {
      response.error = error.statusCode === 422 ? 'Unprocessable Entity' : 'Validation Error';
      response.message = error.message;
      response.statusCode = error.statusCode;
      response.code = error.code;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(error.statusCode).send(response);
    }

    if (error instanceof WorkflowError) {
      response.error = 'Workflow Error';
      response.message = error.message;
      response.statusCode = 422;
      response.code = error.code;
      response.details = {
        currentStatus: error.currentStatus,
        attemptedStatus: error.attemptedStatus,
      };
      return reply.status(422).send(response);
    }

    if (error instanceof ConflictError) {
      response.error = 'Conflict';
      response.message = error.message;
      response.statusCode = 409;
      response.code = error.code;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(409).send(response);
    }

    if (error instanceof IdempotencyKeyRequiredError) {
      response.error = 'Precondition Required';
      response.message = error.message;
      response.statusCode = 428;
      response.code = error.code;
      response.details = { header: error.header };
      return reply.status(428).send(response);
    }

    if (error instanceof UnauthorizedError) {
      response.error = 'Unauthorized';
      response.message = error.message;
      response.statusCode = 401;
      response.code = error.code;
      return reply.status(401).send(response);
    }

    if (error instanceof ApplyFailureError) {
      request.log.warn({ orderId: error.orderId, err: error.cause }, 'Order apply failed');
      response.error = 'Apply Failed';
      response.message = error.message;
      response.statusCode = 502;
      response.code = error.code;
      response.details = { orderId: error.orderId };
      return reply.status(502).send(response);
    }

    // Handle Fastify errors (e.g., malformed JSON bodies)
    if ('statusCode' in error && typeof error.statusCode === 'number') {
      response.statusCode = error.statusCode;
      response.message = error.message;
      if (error.statusCode === 400) {
        response.error = 'Bad Request';
      } else if (error.statusCode === 404) {
        response.error = 'Not Found';
      }
      return reply.status(error.statusCode).send(response);
    }

    // Log unexpected errors
    fastify.log.error(error);

    return reply.status(500).send(response);
  });
}
