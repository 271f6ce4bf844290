import { FastifyInstance } from 'fastify';
import { EngineController } from '../../adapters/controllers/EngineController';
import { UnsupportedLanguageError } from '../../domain/errors';
import { InlineUseCase } from '../../usecases/InlineUseCase';
import { SliceUseCase } from '../../usecases/SliceUseCase';
import { createServer } from './server';

describe('createServer', () => {
  let server: FastifyInstance;
  let mockSliceUC: jest.Mocked<SliceUseCase>;
  let mockInlineUC: jest.Mocked<InlineUseCase>;

  const source = { filename: 'a.py', content: 'x = 1\n', point: { line: 0, col: 0 } };

  beforeEach(async () => {
    mockSliceUC = { execute: jest.fn() } as unknown as jest.Mocked<SliceUseCase>;
    mockInlineUC = { execute: jest.fn() } as unknown as jest.Mocked<InlineUseCase>;
    server = createServer(new EngineController(mockSliceUC, mockInlineUC));
    await server.ready();
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await server.close();
    jest.restoreAllMocks();
  });

  it('should answer health checks', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('should slice a valid request', async () => {
    mockSliceUC.execute.mockResolvedValue({ rangesToRemove: [] });

    const response = await server.inject({
      method: 'POST',
      url: '/slice',
      payload: { source, direction: 'FORWARD' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ rangesToRemove: [] });
    expect(mockSliceUC.execute).toHaveBeenCalledWith({ source, direction: 'FORWARD' });
  });

  it('should reject a body with an unknown direction', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/slice',
      payload: { source, direction: 'SIDEWAYS' },
    });

    expect(response.statusCode).toBe(400);
    expect(mockSliceUC.execute).not.toHaveBeenCalled();
  });

  it('should reject an inline request without a target point', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/inline',
      payload: { source, targetContent: 'def f():\n    return 1\n' },
    });

    expect(response.statusCode).toBe(400);
    expect(mockInlineUC.execute).not.toHaveBeenCalled();
  });

  it('should map domain errors to status codes', async () => {
    mockInlineUC.execute.mockRejectedValue(new UnsupportedLanguageError('a.txt'));

    const response = await server.inject({
      method: 'POST',
      url: '/inline',
      payload: { source, targetContent: '', targetPoint: { line: 0, col: 0 } },
    });

    expect(response.statusCode).toBe(415);
    expect(response.json()).toEqual({
      error: 'Unsupported language for file: a.txt',
      kind: 'UnsupportedLanguageError',
    });
  });
});
