import { FastifyInstance } from 'fastify';
import * as readline from 'readline';
import { Readable, Writable } from 'stream';

const METHODS = ['slice', 'inline'];

type RequestId = string | number | null;

interface StdioRequest {
  id: RequestId;
  method: string;
  params: object;
}

export type StdioResponse =
  | { id: RequestId; result: unknown }
  | { id: RequestId; error: { message: string; kind: string } };

/**
 * One JSON request per input line, one JSON answer per output line. Requests go through
 * the same routes as HTTP clients, so validation and error mapping are shared.
 */
export class StdioTransport {
  constructor(
    private readonly server: FastifyInstance,
    private readonly input: Readable,
    private readonly output: Writable,
  ) {}

  /** Resolves once the input has ended and every answer is written. */
  async run(): Promise<void> {
    const lines = readline.createInterface({ input: this.input, crlfDelay: Infinity });
    for await (const line of lines) {
      if (line.trim() === '') {
        continue;
      }
      const response = await this.handle(line);
      this.output.write(`${JSON.stringify(response)}\n`);
    }
  }

  async handle(line: string): Promise<StdioResponse> {
    let message: unknown;
    try {
      message = JSON.parse(line);
    } catch {
      return { id: null, error: { message: 'Invalid JSON', kind: 'ParseError' } };
    }

    const request = toRequest(message);
    if (!request) {
      return {
        id: null,
        error: { message: 'Expected {"id"?, "method", "params"}', kind: 'InvalidRequest' },
      };
    }
    if (!METHODS.includes(request.method)) {
      return {
        id: request.id,
        error: { message: `Unknown method: ${request.method}`, kind: 'MethodNotFound' },
      };
    }

    const response = await this.server.inject({
      method: 'POST',
      url: `/${request.method}`,
      payload: request.params,
    });
    const body: unknown = response.json();
    if (response.statusCode === 200) {
      return { id: request.id, result: body };
    }
    return { id: request.id, error: describeError(response.statusCode, body) };
  }
}

function toRequest(message: unknown): StdioRequest | null {
  if (typeof message !== 'object' || message === null) {
    return null;
  }
  if (!('method' in message) || !('params' in message)) {
    return null;
  }
  const { method, params } = message;
  const id = 'id' in message ? message.id : null;
  if (typeof method !== 'string' || typeof params !== 'object' || params === null) {
    return null;
  }
  if (id !== null && typeof id !== 'string' && typeof id !== 'number') {
    return null;
  }
  return { id, method, params };
}

// Route errors carry {error, kind}; fastify's validation errors carry {message}.
function describeError(status: number, body: unknown): { message: string; kind: string } {
  const fields: object = typeof body === 'object' && body !== null ? body : {};
  const kind = 'kind' in fields && typeof fields.kind === 'string' ? fields.kind : null;
  const message =
    'message' in fields && typeof fields.message === 'string'
      ? fields.message
      : 'error' in fields && typeof fields.error === 'string'
        ? fields.error
        : `Request failed with status ${status}`;
  return { message, kind: kind ?? (status === 400 ? 'InvalidRequest' : 'InternalError') };
}
