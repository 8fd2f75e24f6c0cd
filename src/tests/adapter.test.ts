/**
 * Backend Tests
 * =============
 *
 * Tests for the generation backend layer:
 * - Request validation
 * - MockBackend
 * - HTTP backends against an in-process server
 * - Backend factory and credentials
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';

import {
  AnthropicBackend,
  BackendError,
  DifyBackend,
  LocalBackend,
  MockBackend,
  OpenAICompatibleBackend,
  createBackend,
  createBackendByName,
  defaultTestFile,
  validateRequest,
} from '../adapters/index.js';
import type { GenerationRequest } from '../adapters/index.js';

// =============================================================================
// Test Utilities
// =============================================================================

function createRequest(overrides: Partial<GenerationRequest> = {}): GenerationRequest {
  return {
    prompt: 'Function name: `add`\nTest suite name: `calcTest`',
    max_tokens: 2500,
    temperature: 0.3,
    language: 'c',
    ...overrides,
  };
}

function isBackendError(code: string) {
  return (error: unknown): boolean => error instanceof BackendError && error.code === code;
}

/**
 * Run fn with an environment variable removed, restoring it afterwards.
 */
function withoutEnv<T>(key: string, fn: () => T): T {
  const saved = process.env[key];
  delete process.env[key];
  try {
    return fn();
  } finally {
    if (saved !== undefined) process.env[key] = saved;
  }
}

// =============================================================================
// Request Validation Tests
// =============================================================================

describe('validateRequest', () => {
  it('should accept a well-formed request', () => {
    assert.doesNotThrow(() => validateRequest(createRequest()));
  });

  it('should reject an empty prompt', () => {
    assert.throws(() => validateRequest(createRequest({ prompt: '   ' })), isBackendError('INVALID_REQUEST'));
  });

  it('should reject a non-positive token cap', () => {
    assert.throws(() => validateRequest(createRequest({ max_tokens: 0 })), isBackendError('INVALID_REQUEST'));
    assert.throws(() => validateRequest(createRequest({ max_tokens: 1.5 })), isBackendError('INVALID_REQUEST'));
  });

  it('should reject a temperature outside [0, 2]', () => {
    assert.throws(() => validateRequest(createRequest({ temperature: 2.5 })), isBackendError('INVALID_REQUEST'));
    assert.throws(() => validateRequest(createRequest({ temperature: -0.1 })), isBackendError('INVALID_REQUEST'));
  });
});

// =============================================================================
// MockBackend Tests
// =============================================================================

describe('MockBackend', () => {
  it('should build a default test from the names in the prompt', async () => {
    const backend = new MockBackend();
    const response = await backend.generate(createRequest());

    assert.equal(response.success, true);
    assert.equal(response.model, 'mock');
    assert.equal(
      response.code,
      [
        '```cpp',
        '#include <gtest/gtest.h>',
        '',
        'TEST(calcTest, add_ReturnsExpectedValue) {',
        '    // add',
        '    EXPECT_TRUE(true);',
        '}',
        '```',
      ].join('\n')
    );
  });

  it('should fall back to placeholder names', () => {
    assert.ok(defaultTestFile('no names here').includes('TEST(MockTest, generated_ReturnsExpectedValue) {'));
  });

  it('should estimate usage at four characters per token', async () => {
    const backend = new MockBackend();
    backend.addSubstringMatch('xxxx', { content: 'y'.repeat(20) });

    const response = await backend.generate(createRequest({ prompt: 'x'.repeat(40) }));

    assert.deepEqual(response.usage, { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 });
  });

  it('should prefer scripted steps over substring matches', async () => {
    const backend = new MockBackend();
    backend.addSubstringMatch('add', { content: 'matched' });
    backend.enqueue({ content: 'scripted' });

    assert.equal((await backend.generate(createRequest())).code, 'scripted');
    assert.equal((await backend.generate(createRequest())).code, 'matched');
    assert.equal(backend.callCount, 2);
  });

  it('should throw scripted errors', async () => {
    const backend = new MockBackend();
    backend.enqueue({ error: new BackendError('HTTP_STATUS', 'busy', 503) });

    await assert.rejects(backend.generate(createRequest()), (error: unknown) => {
      return error instanceof BackendError && error.status === 503;
    });
  });

  it('should report scripted failures without throwing', async () => {
    const backend = new MockBackend();
    backend.enqueue({ content: '', failure: 'model refused' });

    const response = await backend.generate(createRequest());

    assert.equal(response.success, false);
    assert.equal(response.error, 'model refused');
    assert.equal(response.code, '');
  });

  it('should record requests in call order', async () => {
    const backend = new MockBackend();
    await backend.generate(createRequest({ prompt: 'first' }));
    await backend.generate(createRequest({ prompt: 'second' }));

    assert.deepEqual(
      backend.getRequests().map((r) => r.prompt),
      ['first', 'second']
    );
  });

  it('should refuse requests after shutdown', async () => {
    const backend = new MockBackend();
    await backend.shutdown();

    assert.equal(await backend.isReady(), false);
    await assert.rejects(backend.generate(createRequest()), isBackendError('CONFIGURATION'));
  });
});

// =============================================================================
// HTTP Backend Tests
// =============================================================================

describe('HTTP backends', () => {
  let server: Server;
  let baseUrl: string;
  const received: Array<{ url: string; auth: string | undefined; body: unknown }> = [];
  let reply: { status: number; body: string; stall?: boolean } = { status: 200, body: '{}' };
  const stalled: ServerResponse[] = [];

  before(async () => {
    server = createServer((req: IncomingMessage, res: ServerResponse) => {
      let raw = '';
      req.on('data', (chunk: Buffer) => {
        raw += chunk.toString('utf-8');
      });
      req.on('end', () => {
        received.push({ url: req.url ?? '', auth: req.headers.authorization, body: raw ? JSON.parse(raw) : null });
        res.writeHead(reply.status, { 'Content-Type': 'application/json' });
        if (reply.stall === true) {
          // Headers and part of the body, then nothing.
          res.write(reply.body);
          stalled.push(res);
          return;
        }
        res.end(reply.body);
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server has no port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    for (const res of stalled) res.end();
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  it('should read a local server completion and its token counts', async () => {
    reply = {
      status: 200,
      body: JSON.stringify({ response: '  TEST(a, b) {}  ', model: 'tiny', prompt_eval_count: 12, eval_count: 8 }),
    };
    const backend = new LocalBackend({ base_url: `${baseUrl}/`, timeout_ms: 5000 });

    const response = await backend.generate(createRequest());

    assert.equal(response.code, 'TEST(a, b) {}');
    assert.equal(response.model, 'tiny');
    assert.deepEqual(response.usage, { prompt_tokens: 12, completion_tokens: 8, total_tokens: 20 });
    const last = received[received.length - 1];
    assert.equal(last?.url, '/api/generate');
  });

  it('should send a blocking Dify request with the bearer key', async () => {
    reply = {
      status: 200,
      body: JSON.stringify({
        answer: 'generated',
        metadata: { usage: { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 } },
      }),
    };
    const backend = new DifyBackend({ api_key: 'test-secret', base_url: baseUrl, timeout_ms: 5000 });

    const response = await backend.generate(createRequest());

    assert.equal(response.code, 'generated');
    assert.equal(response.model, 'dify_model');
    assert.deepEqual(response.usage, { prompt_tokens: 3, completion_tokens: 4, total_tokens: 7 });
    const last = received[received.length - 1];
    assert.equal(last?.url, '/chat-messages');
    assert.equal(last?.auth, 'Bearer test-secret');
    assert.deepEqual(last?.body, {
      inputs: {},
      query: createRequest().prompt,
      response_mode: 'blocking',
      user: 'testforge',
    });
  });

  it('should surface the HTTP status of a rejected call', async () => {
    reply = { status: 429, body: '{"error":"slow down"}' };
    const backend = new LocalBackend({ base_url: baseUrl, timeout_ms: 5000 });

    await assert.rejects(backend.generate(createRequest()), (error: unknown) => {
      return error instanceof BackendError && error.code === 'HTTP_STATUS' && error.status === 429;
    });
  });

  it('should time out a body that stops arriving after the headers', async () => {
    reply = { status: 200, body: '{"response":', stall: true };
    const backend = new LocalBackend({ base_url: baseUrl, timeout_ms: 100 });

    await assert.rejects(backend.generate(createRequest()), isBackendError('TIMEOUT'));
  });

  it('should reject a reply without the completion field', async () => {
    reply = { status: 200, body: '{"model":"tiny"}' };
    const backend = new LocalBackend({ base_url: baseUrl, timeout_ms: 5000 });

    await assert.rejects(backend.generate(createRequest()), isBackendError('INVALID_RESPONSE'));
  });

  it('should reject a reply that is not JSON', async () => {
    reply = { status: 200, body: 'not json' };
    const backend = new DifyBackend({ api_key: 'test-secret', base_url: baseUrl, timeout_ms: 5000 });

    await assert.rejects(backend.generate(createRequest()), isBackendError('INVALID_RESPONSE'));
  });
});

// =============================================================================
// Factory Tests
// =============================================================================

describe('createBackend', () => {
  it('should create a mock backend with an optional model name', () => {
    assert.equal(createBackend({ provider: 'mock' }).model_id, 'mock');
    assert.equal(createBackend({ provider: 'mock', model: 'scripted' }).model_id, 'scripted');
  });

  it('should default the OpenAI-compatible models per provider', () => {
    const openai = createBackend({ provider: 'openai', api_key: 'test-secret' });
    const deepseek = createBackend({ provider: 'deepseek', api_key: 'test-secret' });

    assert.ok(openai instanceof OpenAICompatibleBackend);
    assert.equal(openai.model_id, 'gpt-3.5-turbo');
    assert.equal(deepseek.provider, 'deepseek');
    assert.equal(deepseek.model_id, 'deepseek-chat');
  });

  it('should create the Anthropic backend', () => {
    const backend = createBackend({ provider: 'anthropic', api_key: 'test-secret', model: 'test-model' });
    assert.ok(backend instanceof AnthropicBackend);
    assert.equal(backend.model_id, 'test-model');
  });

  it('should not require credentials for a local server', () => {
    const backend = createBackend({ provider: 'local', base_url: 'http://127.0.0.1:1' });
    assert.ok(backend instanceof LocalBackend);
    assert.equal(backend.model_id, 'qwen2.5-coder');
  });

  it('should fail without credentials', () => {
    withoutEnv('OPENAI_API_KEY', () => {
      assert.throws(() => createBackend({ provider: 'openai' }), isBackendError('CONFIGURATION'));
    });
    withoutEnv('ANTHROPIC_API_KEY', () => {
      assert.throws(() => createBackend({ provider: 'anthropic' }), isBackendError('CONFIGURATION'));
    });
    withoutEnv('DIFY_API_KEY', () => {
      assert.throws(() => createBackend({ provider: 'dify' }), isBackendError('CONFIGURATION'));
    });
  });

  it('should reject unknown provider names', () => {
    assert.throws(() => createBackendByName('nobody'), (error: unknown) => {
      return error instanceof BackendError && error.message === 'Unknown provider: nobody';
    });
    assert.equal(createBackendByName('mock').provider, 'mock');
  });
});
