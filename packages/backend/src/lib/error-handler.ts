import { FastifyInstance, FastifyError } from 'fastify';
import { ZodError } from 'zod';
import {
  NotFoundError,
  ValidationError,
  ConflictError,
  InvalidCapacityError,
  CapacityExceededError,
  PlanExecutionError,
} from './errors.js';

interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
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
      response.details = error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      return reply.status(400).send(response);
    }

    if (error instanceof NotFoundError) {
      response.error = 'Not Found';
      response.message = error.message;
      response.statusCode = 404;
      return reply.status(404).send(response);
    }

    if (error instanceof ValidationError) {
      response.error = 'Validation Error';
      response.message = error.message;
      response.statusCode = 400;
      if (error.details) {
        response.details = error.details;
      }
      return reply.status(400).send(response);
    }

    if (error instanceof InvalidCapacityError) {
      response.error = 'Invalid Capacity';
      response.message = error.message;
      response.statusCode = 400;
      if (error.libraryId !== undefined) {
        response.details = { libraryId: error.libraryId };
      }
      return reply.status(400).send(response);
    }

    if (error instanceof CapacityExceededError) {
      response.error = 'Capacity Exceeded';
      response.message = error.message;
      response.statusCode = 422;
      response.details = {
        libraryId: error.libraryId,
        overflow: error.overflow,
      };
      return reply.status(422).send(response);
    }

    if (error instanceof ConflictError) {
      response.error = 'Conflict';
      response.message = error.message;
      response.statusCode = 409;
      return reply.status(409).send(response);
    }

    if (error instanceof PlanExecutionError) {
      request.log.error({ err: error.cause ?? error }, 'Plan execution failed');
      response.error = 'Plan Execution Failed';
      response.message = error.message;
      response.details = { report: error.report };
      return reply.status(500).send(response);
    }

    // Handle Fastify errors (e.g., body parsing errors)
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
    request.log.error(error);

    return reply.status(500).send(response);
  });
}
