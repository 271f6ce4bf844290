import { FastifyReply, FastifyRequest } from 'fastify';
import { InlineRequest, SliceRequest } from '../../domain/entities';
import {
  ArityMismatchError,
  CallNotFoundError,
  InlineError,
  ParseFailureError,
  SeedNotFoundError,
  TargetUnresolvableError,
  UnsupportedLanguageError,
} from '../../domain/errors';
import { InlineUseCase } from '../../usecases/InlineUseCase';
import { SliceUseCase } from '../../usecases/SliceUseCase';

export interface ErrorResponse {
  status: number;
  body: { error: string; kind: string; expected?: number; actual?: number };
}

/** Maps an error from a use case to the HTTP status and body a client receives. */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof UnsupportedLanguageError) {
    return { status: 415, body: { error: error.message, kind: error.name } };
  }
  if (error instanceof ArityMismatchError) {
    return {
      status: 422,
      body: {
        error: error.message,
        kind: error.name,
        expected: error.expected,
        actual: error.actual,
      },
    };
  }
  if (error instanceof ParseFailureError || error instanceof InlineError) {
    return { status: 422, body: { error: error.message, kind: error.name } };
  }
  if (
    error instanceof SeedNotFoundError ||
    error instanceof CallNotFoundError ||
    error instanceof TargetUnresolvableError
  ) {
    return { status: 404, body: { error: error.message, kind: error.name } };
  }
  return { status: 500, body: { error: 'Internal Server Error', kind: 'InternalError' } };
}

export class EngineController {
  constructor(
    private readonly sliceUC: SliceUseCase,
    private readonly inlineUC: InlineUseCase,
  ) {}

  async slice(req: FastifyRequest<{ Body: SliceRequest }>, reply: FastifyReply) {
    try {
      const result = await this.sliceUC.execute(req.body);
      return reply.send(result);
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  async inline(req: FastifyRequest<{ Body: InlineRequest }>, reply: FastifyReply) {
    try {
      const result = await this.inlineUC.execute(req.body);
      return reply.send(result);
    } catch (error) {
      return this.handleError(error, reply);
    }
  }

  private handleError(error: unknown, reply: FastifyReply) {
    console.error(error);
    const { status, body } = toErrorResponse(error);
    return reply.status(status).send(body);
  }
}
