import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import { ToolRegistry } from '../../../src/tools/toolRegistry.js';
import type { ToolHandler } from '../../../src/tools/toolRegistry.js';
import { InvalidArgumentsError, ToolError, UnknownToolError } from '../../../src/errors/tool.js';
import { RetrievalFailedError } from '../../../src/errors/retrieval.js';

const echoSchema = z.object({ text: z.string() });

function echoRegistry(handler: ToolHandler<typeof echoSchema>): ToolRegistry {
  const registry = new ToolRegistry();
  registry.register('echo', echoSchema, handler, 'Echo the text back.');
  return registry;
}

describe('ToolRegistry', () => {
  it('runs a registered tool with parsed arguments', async () => {
    const handler = vi.fn<ToolHandler<typeof echoSchema>>(async ({ text }) => ({
      unitIds: [],
      conclusion: text,
      confidence: 'high',
    }));
    const registry = echoRegistry(handler);

    const result = await registry.invoke('echo', { text: 'hi' });
    expect(result).toEqual({ ok: true, value: { unitIds: [], conclusion: 'hi', confidence: 'high' } });
    expect(handler).toHaveBeenCalledWith({ text: 'hi' }, {});
  });

  it('passes the tool context through', async () => {
    const handler = vi.fn<ToolHandler<typeof echoSchema>>(async () => ({
      unitIds: [],
      conclusion: '',
      confidence: 'low',
    }));
    const controller = new AbortController();
    await echoRegistry(handler).invoke('echo', { text: 'x' }, { signal: controller.signal });
    expect(handler.mock.calls[0]?.[1].signal).toBe(controller.signal);
  });

  it('reports unknown tools as results', async () => {
    const result = await new ToolRegistry().invoke('missing', {});
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(UnknownToolError);
    expect(result.error.message).toBe('Unknown tool: missing');
    expect(result.error.toolCode).toBe('UNKNOWN_TOOL');
  });

  it('rejects invalid arguments without calling the handler', async () => {
    const handler = vi.fn<ToolHandler<typeof echoSchema>>();
    const registry = echoRegistry(handler);

    const missing = await registry.invoke('echo', {});
    expect(missing.ok).toBe(false);
    if (missing.ok) return;
    expect(missing.error).toBeInstanceOf(InvalidArgumentsError);
    expect(missing.error.message).toBe('Invalid arguments for echo: text: Required');

    const wrongShape = await registry.invoke('echo', 'hi');
    if (wrongShape.ok) throw new Error('expected failure');
    expect(wrongShape.error.message).toBe('Invalid arguments for echo: (root): Expected object, received string');
    expect(handler).not.toHaveBeenCalled();
  });

  it('wraps handler failures as TOOL_FAILED', async () => {
    const registry = echoRegistry(async () => {
      throw new Error('boom');
    });
    const result = await registry.invoke('echo', { text: 'x' });
    if (result.ok) throw new Error('expected failure');
    expect(result.error).toMatchObject({
      message: 'echo failed: boom',
      toolCode: 'TOOL_FAILED',
      toolName: 'echo',
      fatal: false,
    });
  });

  it('marks fatal collaborator errors as COLLABORATOR_UNAVAILABLE', async () => {
    const cause = new RetrievalFailedError('Retrieval failed after 3 embedding attempts', 3);
    const registry = echoRegistry(async () => {
      throw cause;
    });
    const result = await registry.invoke('echo', { text: 'x' });
    if (result.ok) throw new Error('expected failure');
    expect(result.error.toolCode).toBe('COLLABORATOR_UNAVAILABLE');
    expect(result.error.fatal).toBe(true);
    expect(result.error.cause).toBe(cause);
  });

  it('passes ToolErrors from handlers through unchanged', async () => {
    const own = new ToolError('nothing to index', 'TOOL_FAILED', 'echo');
    const result = await echoRegistry(async () => {
      throw own;
    }).invoke('echo', { text: 'x' });
    if (result.ok) throw new Error('expected failure');
    expect(result.error).toBe(own);
  });

  it('refuses duplicate names and lists descriptors', () => {
    const registry = echoRegistry(vi.fn<ToolHandler<typeof echoSchema>>());
    expect(() => registry.register('echo', echoSchema, vi.fn<ToolHandler<typeof echoSchema>>())).toThrow(
      'Tool already registered: echo',
    );
    expect(registry.has('echo')).toBe(true);
    expect(registry.list()).toEqual([{ name: 'echo', description: 'Echo the text back.' }]);
  });
});
