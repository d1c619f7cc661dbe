import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { ExecutorDescriptorSchema } from '../../config.js';
import { ProbeError } from '../../errors.js';
import { HttpExecutorAdapter } from '../adapters/http-adapter.js';
import { CliExecutorAdapter, parseModelListing, type CommandRunner } from '../adapters/cli-adapter.js';
import { RpcExecutorAdapter } from '../adapters/rpc-adapter.js';
import { createDefaultAdapterFactories } from '../adapters/index.js';

const mockFetch = vi.fn();

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

describe('HttpExecutorAdapter', () => {
  const descriptor = ExecutorDescriptorSchema.parse({
    id: 'vllm',
    transport: 'http',
    endpoint: 'http://vllm.test:8000/',
    apiKey: 'test-secret',
  });

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('reports healthy on a 2xx /health', async () => {
    mockFetch.mockResolvedValueOnce(new Response('ok', { status: 200 }));
    const adapter = new HttpExecutorAdapter(descriptor);

    expect(await adapter.healthCheck(new AbortController().signal)).toBe(true);
    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('http://vllm.test:8000/health');
    expect(init.headers.Authorization).toBe('Bearer test-secret');
  });

  test('reports unhealthy on a 503 /health', async () => {
    mockFetch.mockResolvedValueOnce(new Response('down', { status: 503 }));
    const adapter = new HttpExecutorAdapter(descriptor);
    expect(await adapter.healthCheck(new AbortController().signal)).toBe(false);
  });

  test('lists models from an OpenAI-style body', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      object: 'list',
      data: [
        { id: 'qwen-coder', object: 'model', context_length: 32768 },
        { id: 'phi', name: 'Phi Mini' },
      ],
    }));
    const adapter = new HttpExecutorAdapter(descriptor);

    expect(await adapter.listModels(new AbortController().signal)).toEqual([
      { id: 'qwen-coder', contextWindow: 32768 },
      { id: 'phi', displayName: 'Phi Mini' },
    ]);
    expect(mockFetch.mock.calls[0]?.[0]).toBe('http://vllm.test:8000/v1/models');
  });

  test('rejects malformed model lists', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ models: ['a'] }));
    const adapter = new HttpExecutorAdapter(descriptor);
    await expect(adapter.listModels(new AbortController().signal)).rejects.toThrow(
      'Probe of vllm failed: invalid model list response'
    );
  });

  test('rejects non-2xx model list responses', async () => {
    mockFetch.mockResolvedValueOnce(new Response('nope', { status: 500, statusText: 'Internal Server Error' }));
    const adapter = new HttpExecutorAdapter(descriptor);
    await expect(adapter.listModels(new AbortController().signal)).rejects.toBeInstanceOf(ProbeError);
  });
});

describe('RpcExecutorAdapter', () => {
  const descriptor = ExecutorDescriptorSchema.parse({
    id: 'bridge',
    transport: 'rpc',
    endpoint: 'http://bridge.test/rpc',
    apiKey: 'test-secret',
  });

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  test('sends JSON-RPC 2.0 requests', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 1, result: true }));
    const adapter = new RpcExecutorAdapter(descriptor);

    expect(await adapter.healthCheck(new AbortController().signal)).toBe(true);

    const [url, init] = mockFetch.mock.calls[0] ?? [];
    expect(url).toBe('http://bridge.test/rpc');
    expect(init.method).toBe('POST');
    expect(init.headers['x-api-key']).toBe('test-secret');
    const body = JSON.parse(init.body);
    expect(body).toMatchObject({ jsonrpc: '2.0', method: 'health', params: {} });
    expect(typeof body.id).toBe('string');
  });

  test('accepts an object health result', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ jsonrpc: '2.0', id: 'x', result: { healthy: false, load: 0.9 } }));
    const adapter = new RpcExecutorAdapter(descriptor);
    expect(await adapter.healthCheck(new AbortController().signal)).toBe(false);
  });

  test('lists models with metadata', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      jsonrpc: '2.0',
      id: 'x',
      result: [{ id: 'mlx-llama', costPerMillionTokens: 0, contextWindow: 8192 }],
    }));
    const adapter = new RpcExecutorAdapter(descriptor);
    expect(await adapter.listModels(new AbortController().signal)).toEqual([
      { id: 'mlx-llama', costPerMillionTokens: 0, contextWindow: 8192 },
    ]);
  });

  test('surfaces JSON-RPC errors as ProbeError', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({
      jsonrpc: '2.0',
      id: 'x',
      error: { code: -32601, message: 'Method not found' },
    }));
    const adapter = new RpcExecutorAdapter(descriptor);
    await expect(adapter.listModels(new AbortController().signal)).rejects.toThrow(
      'Probe of bridge failed: listModels: Method not found'
    );
  });
});

describe('CliExecutorAdapter', () => {
  const listing = [
    'NAME                ID              SIZE      MODIFIED',
    'llama3:8b           365c0bd3c000    4.7 GB    2 days ago',
    'qwen2.5-coder:7b    2b0496514337    4.7 GB    5 weeks ago',
    '',
  ].join('\n');

  test('parses the first column and skips the header', () => {
    expect(parseModelListing(listing)).toEqual(['llama3:8b', 'qwen2.5-coder:7b']);
  });

  test('returns nothing for a header-only listing', () => {
    expect(parseModelListing('NAME ID SIZE MODIFIED\n')).toEqual([]);
  });

  test('runs the command with default args', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({ stdout: listing });
    const adapter = new CliExecutorAdapter(
      ExecutorDescriptorSchema.parse({ id: 'ollama', transport: 'cli', command: 'ollama' }),
      run
    );

    expect(await adapter.listModels(new AbortController().signal)).toEqual([
      { id: 'llama3:8b' },
      { id: 'qwen2.5-coder:7b' },
    ]);
    expect(run.mock.calls[0]?.[0]).toBe('ollama');
    expect(run.mock.calls[0]?.[1]).toEqual(['list']);
  });

  test('is unhealthy when the command fails', async () => {
    const run = vi.fn<CommandRunner>().mockRejectedValue(new Error('spawn ollama ENOENT'));
    const adapter = new CliExecutorAdapter(
      ExecutorDescriptorSchema.parse({ id: 'ollama', transport: 'cli', command: 'ollama', args: ['ls'] }),
      run
    );

    expect(await adapter.healthCheck(new AbortController().signal)).toBe(false);
    expect(run.mock.calls[0]?.[1]).toEqual(['ls']);
  });
});

describe('createDefaultAdapterFactories', () => {
  test('covers every transport', () => {
    const factories = createDefaultAdapterFactories();
    expect(Object.keys(factories).sort()).toEqual(['cli', 'http', 'rpc', 'static']);

    const adapter = factories.rpc?.(ExecutorDescriptorSchema.parse({
      id: 'bridge',
      transport: 'rpc',
      endpoint: 'http://bridge.test/rpc',
    }));
    expect(adapter?.transport).toBe('rpc');
  });
});
