import { describe, it, expect } from 'vitest';
import { validateBody } from '../../src/middleware/validate-body.js';
import type { Handler } from '../../src/middleware/pipeline.js';
import type { BodySchema } from '../../src/types/common.js';
import { anonymous } from '../mocks/fixtures.js';

describe('validateBody', () => {
  const echoHandler: Handler = async (req) => {
    return new Response(await req.text(), { status: 200 });
  };

  function makeReq(body: unknown): Request {
    return new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  const schema: BodySchema = {
    kolokwaText: { type: 'string', required: true, maxLength: 20 },
    points: { type: 'number', required: false, min: 1, max: 100 },
    tags: { type: 'array', required: false },
  };

  it('should pass a valid body through to the handler, readable again', async () => {
    const wrapped = validateBody(schema)(echoHandler);
    const res = await wrapped(makeReq({ kolokwaText: 'Kpanda', points: 5, tags: ['a'] }), anonymous());

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ kolokwaText: 'Kpanda', points: 5, tags: ['a'] });
  });

  it('should reject a missing required field', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ points: 5 }), anonymous());

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'kolokwaText is required',
        details: { fields: ['kolokwaText is required'] },
      },
    });
  });

  it('should report every failing field', async () => {
    const res = await validateBody(schema)(echoHandler)(
      makeReq({ kolokwaText: 'k'.repeat(21), points: 0, tags: 'x' }),
      anonymous()
    );

    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message:
          'kolokwaText must be 20 characters or less; points must be at least 1; tags must be an array',
        details: {
          fields: [
            'kolokwaText must be 20 characters or less',
            'points must be at least 1',
            'tags must be an array',
          ],
        },
      },
    });
  });

  it('should reject a wrong type', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ kolokwaText: 123 }), anonymous());

    expect(res.status).toBe(400);
  });

  it('should reject a number above max', async () => {
    const res = await validateBody(schema)(echoHandler)(
      makeReq({ kolokwaText: 'Kpanda', points: 101 }),
      anonymous()
    );

    expect(res.status).toBe(400);
  });

  it('should reject a non-JSON body', async () => {
    const req = new Request('http://test', { method: 'POST', body: 'not json' });
    const res = await validateBody(schema)(echoHandler)(req, anonymous());

    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Request body must be valid JSON' },
    });
  });

  it('should reject a JSON array', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq(['Kpanda']), anonymous());

    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Request body must be a JSON object' },
    });
  });

  it('should validate numeric enums', async () => {
    const voteSchema: BodySchema = {
      polarity: { type: 'number', required: true, enum: [1, -1] },
    };
    const wrapped = validateBody(voteSchema)(echoHandler);

    const good = await wrapped(makeReq({ polarity: -1 }), anonymous());
    expect(good.status).toBe(200);

    const bad = await wrapped(makeReq({ polarity: 0 }), anonymous());
    expect(await bad.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'polarity must be one of: 1, -1',
        details: { fields: ['polarity must be one of: 1, -1'] },
      },
    });
  });
});
