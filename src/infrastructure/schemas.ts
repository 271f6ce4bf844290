// JSON Schemas for the HTTP routes. The stdio transport reaches the same routes through `inject`.

const point = {
  type: 'object',
  properties: {
    line: { type: 'integer', minimum: 0 },
    col: { type: 'integer', minimum: 0 },
  },
  required: ['line', 'col'],
} as const;

const source = {
  type: 'object',
  properties: {
    filename: { type: 'string', minLength: 1 },
    content: { type: 'string' },
    language: { type: 'string' },
    point,
  },
  required: ['filename', 'content', 'point'],
} as const;

export const sliceRequestSchema = {
  type: 'object',
  properties: {
    source,
    direction: { type: 'string', enum: ['BACKWARD', 'FORWARD'] },
  },
  required: ['source', 'direction'],
} as const;

export const inlineRequestSchema = {
  type: 'object',
  properties: {
    source,
    targetContent: { type: 'string' },
    targetPoint: point,
  },
  required: ['source', 'targetContent', 'targetPoint'],
} as const;
