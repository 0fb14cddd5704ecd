import { describe, expect, it } from 'vitest';

import type { StubScript } from '../fixtures/stub-provider.js';

import { Agent, parseRunOverrides } from '../../agent.js';
import { ConfigError, TemperatureError } from '../../errors.js';
import { CANNED, HttpStatusError, cannedScript, createStubFactory } from '../fixtures/stub-provider.js';

const stepsOf = (report: { steps: { step: string }[] }): string[] => report.steps.map((record) => record.step);

describe('Agent.run', () => {
  it('walks UNDERSTAND, PLAN, EXECUTE and VERIFY and returns the EXECUTE output', async () => {
    const { factory, calls } = createStubFactory({ primary: cannedScript });
    const report = await new Agent({ factory }).run('Say hello');
    expect(report.error).toBeUndefined();
    expect(report.result).toBe(CANNED.EXECUTE);
    expect(stepsOf(report)).toEqual(['UNDERSTAND', 'PLAN', 'EXECUTE', 'VERIFY']);
    expect(report.steps.map((record) => record.next)).toEqual(['PLAN', 'EXECUTE', 'VERIFY', 'END']);
    expect(calls).toHaveLength(4);
    expect(report.state.currentStep).toBe('END');
  });

  it('records history in step order with metadata', async () => {
    const { factory } = createStubFactory({ primary: cannedScript });
    const report = await new Agent({ factory }).run('Say hello');
    const messages = report.state.messages;
    expect(messages.map((message) => message.role)).toEqual(['system', 'user', 'assistant', 'user', 'assistant', 'user', 'assistant', 'user', 'assistant']);
    const assistantSteps = messages.filter((message) => message.role === 'assistant').map((message) => message.metadata.step);
    expect(assistantSteps).toEqual(['UNDERSTAND', 'PLAN', 'EXECUTE', 'VERIFY']);
    expect(messages[2].metadata).toMatchObject({ provider: 'primary', model: 'scripted', attempt: 1, tokens: { input: 10, output: 5, total: 15 } });
    const stamps = messages.map((message) => message.metadata.timestamp);
    expect(stamps.every((stamp) => typeof stamp === 'string')).toBe(true);
  });

  it('feeds earlier step output into later prompts', async () => {
    const { factory, calls } = createStubFactory({ primary: cannedScript });
    await new Agent({ factory }).run('Say hello');
    const promptOf = (index: number): string => calls[index].messages.at(-1)?.content ?? '';
    expect(promptOf(0)).toMatch(/^Analyze the task: Say hello/);
    expect(promptOf(1)).toContain(CANNED.UNDERSTAND);
    expect(promptOf(2)).toContain(CANNED.PLAN);
    expect(promptOf(3)).toContain(`Result:\n${CANNED.EXECUTE}`);
  });

  it('rejects an empty task before any provider call', async () => {
    const { factory, calls } = createStubFactory({ primary: cannedScript });
    await expect(new Agent({ factory }).run('   ')).rejects.toThrow(ConfigError);
    expect(calls).toHaveLength(0);
  });

  it('surfaces an authentication failure at UNDERSTAND without retrying', async () => {
    const { factory, calls, sleeps } = createStubFactory({ primary: () => new HttpStatusError(401, 'invalid api key') });
    const report = await new Agent({ factory }).run('Say hello');
    expect(report.result).toBeUndefined();
    expect(report.error).toEqual({ kind: 'api_key_error', message: 'primary (401): invalid api key', retriable: false, provider: 'primary' });
    expect(stepsOf(report)).toEqual(['UNDERSTAND']);
    expect(calls).toHaveLength(1);
    expect(sleeps).toEqual([]);
    expect(report.state.messages.map((message) => message.role)).toEqual(['system']);
  });

  it('calls a provider with a rejected key once and skips it for the rest of the run', async () => {
    const { factory, calls, logs } = createStubFactory({ badKey: () => new HttpStatusError(401, 'invalid api key'), good: cannedScript });
    const report = await new Agent({ factory, chain: ['badKey', 'good'] }).run('Say hello');
    expect(report.result).toBe(CANNED.EXECUTE);
    expect(calls.map((call) => call.provider)).toEqual(['badKey', 'good', 'good', 'good', 'good']);
    expect(report.providers.badKey.unhealthyReason).toBe('authentication failed');
    const skips = logs.filter((entry) => entry.message === 'skipping unhealthy provider: authentication failed');
    expect(skips.map((entry) => entry.step)).toEqual(['PLAN', 'EXECUTE', 'VERIFY']);
  });

  it('falls back along the chain and stops using a provider once it is unhealthy', async () => {
    const { factory, calls, logs } = createStubFactory({ flaky: () => new Error('connection reset'), backup: cannedScript });
    const report = await new Agent({ factory, chain: ['flaky', 'backup'] }).run('Say hello');
    expect(report.result).toBe(CANNED.EXECUTE);
    // three attempts at UNDERSTAND, three at PLAN; the fifth failure trips the health check
    expect(calls.filter((call) => call.provider === 'flaky')).toHaveLength(6);
    expect(calls.filter((call) => call.provider === 'backup')).toHaveLength(4);
    expect(report.providers.flaky.unhealthyReason).toBe('failure rate 100% over 5 requests');
    expect(report.providers.backup.requests).toBe(4);
    expect(logs.some((entry) => entry.message.startsWith('skipping unhealthy provider') && entry.step === 'EXECUTE')).toBe(true);
  });

  it('reports a RetryError when every provider fails', async () => {
    const { factory } = createStubFactory({ a: () => new Error('connection reset'), b: () => new Error('fetch failed') }, { retryCount: 1 });
    const report = await new Agent({ factory, chain: ['a', 'b'] }).run('Say hello');
    expect(report.error?.kind).toBe('retry_error');
    expect(report.error?.failures?.map((failure) => failure.provider)).toEqual(['a', 'b']);
    expect(stepsOf(report)).toEqual(['UNDERSTAND']);
  });

  it('re-executes after a failed verification and stops after verifyRetries', async () => {
    const scores = [4, 7, 5];
    let executions = 0;
    let verifications = 0;
    const script: StubScript = (call) => {
      if (call.step === 'EXECUTE') {
        executions += 1;
        return `Answer ${String(executions)}`;
      }
      if (call.step === 'VERIFY') {
        verifications += 1;
        return `Missing detail.\nVERDICT: FAIL\nSCORE: ${String(scores[verifications - 1])}`;
      }
      return cannedScript(call);
    };
    const { factory, calls } = createStubFactory({ primary: script });
    const report = await new Agent({ factory, verifyRetries: 2 }).run('Say hello');
    expect(stepsOf(report)).toEqual(['UNDERSTAND', 'PLAN', 'EXECUTE', 'VERIFY', 'EXECUTE', 'VERIFY', 'EXECUTE', 'VERIFY']);
    // best-scoring attempt wins
    expect(report.result).toBe('Answer 2');
    expect(report.error).toBeUndefined();
    const secondExecute = calls.filter((call) => call.step === 'EXECUTE')[1];
    expect(secondExecute.messages.at(-1)?.content).toContain('Attempt 1 was rejected during verification:\nMissing detail.');
    expect(secondExecute.messages.at(-1)?.metadata.attempt).toBe(2);
  });

  it('verifies once when verifyRetries is 0', async () => {
    const script: StubScript = (call) => (call.step === 'VERIFY' ? 'VERDICT: FAIL' : cannedScript(call));
    const { factory } = createStubFactory({ primary: script });
    const report = await new Agent({ factory, verifyRetries: 0 }).run('Say hello');
    expect(stepsOf(report)).toEqual(['UNDERSTAND', 'PLAN', 'EXECUTE', 'VERIFY']);
    expect(report.result).toBe(CANNED.EXECUTE);
  });

  it('extracts code from the result', async () => {
    const script: StubScript = (call) => (call.step === 'EXECUTE' ? 'Use this:\n[CODE]\nconsole.log(1);\n[/CODE]' : cannedScript(call));
    const { factory } = createStubFactory({ primary: script });
    const report = await new Agent({ factory }).run('Print one');
    expect(report.code).toBe('console.log(1);');
    expect(report.result).toBe('Use this:\n[CODE]\nconsole.log(1);\n[/CODE]');
  });

  it('stops at the next step boundary once cancelled', async () => {
    const controller = new AbortController();
    const script: StubScript = (call) => {
      if (call.step === 'PLAN') controller.abort();
      return cannedScript(call);
    };
    const { factory, calls } = createStubFactory({ primary: script });
    const report = await new Agent({ factory }).run('Say hello', {}, { abortSignal: controller.signal });
    expect(report.error).toEqual({ kind: 'cancelled', message: 'run cancelled after PLAN', retriable: false });
    expect(calls).toHaveLength(2);
    expect(stepsOf(report)).toEqual(['UNDERSTAND', 'PLAN']);
  });

  it('streams EXECUTE output through onChunk', async () => {
    const { factory } = createStubFactory({ primary: cannedScript });
    const chunks: string[] = [];
    const report = await new Agent({ factory, stream: true }).run('Say hello', {}, {
      onChunk: (chunk, meta) => {
        expect(meta).toEqual({ provider: 'primary', attempt: 1 });
        chunks.push(chunk);
      },
    });
    expect(chunks).toEqual(['Hello, ', 'world.']);
    expect(report.result).toBe(CANNED.EXECUTE);
  });

  it('applies run overrides to every call', async () => {
    const { factory, calls } = createStubFactory({ primary: cannedScript });
    await new Agent({ factory }).run('Say hello', { temperature: 0.1, max_tokens: 300 });
    expect(calls.every((call) => call.config.temperature === 0.1 && call.config.maxTokens === 300)).toBe(true);
  });

  it('routes a run to the provider named in the overrides', async () => {
    const { factory, calls } = createStubFactory({ a: cannedScript, b: cannedScript });
    await new Agent({ factory, chain: ['a'] }).run('Say hello', { provider: 'b' });
    expect(new Set(calls.map((call) => call.provider))).toEqual(new Set(['b']));
  });

  it('rejects bad overrides before any provider call', async () => {
    const { factory, calls } = createStubFactory({ primary: cannedScript });
    const agent = new Agent({ factory });
    await expect(agent.run('Say hello', { temprature: 0.5 })).rejects.toThrow('unrecognized option(s): temprature');
    await expect(agent.run('Say hello', { temperature: 3 })).rejects.toThrow(TemperatureError);
    await expect(agent.run('Say hello', { provider: 'missing' })).rejects.toThrow("unknown provider 'missing'");
    expect(calls).toHaveLength(0);
  });

  it('keeps runs independent', async () => {
    const { factory } = createStubFactory({ primary: cannedScript });
    const agent = new Agent({ factory });
    const [first, second] = await Promise.all([agent.run('Say hello'), agent.run('Say goodbye')]);
    expect(first.runId).not.toBe(second.runId);
    expect(first.state.messages[1].content).toMatch(/^Analyze the task: Say hello/);
    expect(second.state.messages[1].content).toMatch(/^Analyze the task: Say goodbye/);
  });

  it('validates its own options', () => {
    const { factory } = createStubFactory({ primary: cannedScript });
    expect(() => new Agent({ factory, verifyRetries: -1 })).toThrow('verifyRetries must be a non-negative integer');
    expect(() => new Agent({ factory, chain: [] })).toThrow('fallback chain cannot be empty');
  });
});

describe('parseRunOverrides', () => {
  it('merges the snake_case token limit', () => {
    expect(parseRunOverrides({ max_tokens: 50 })).toEqual({ maxTokens: 50 });
    expect(parseRunOverrides({ maxTokens: 50, max_tokens: 50 })).toEqual({ maxTokens: 50 });
    expect(() => parseRunOverrides({ maxTokens: 50, max_tokens: 60 })).toThrow('maxTokens and max_tokens disagree');
  });

  it('raises TemperatureError for a non-numeric temperature', () => {
    expect(() => parseRunOverrides({ temperature: 'warm' })).toThrow(TemperatureError);
  });

  it('treats a missing overrides object as empty', () => {
    expect(parseRunOverrides(undefined)).toEqual({});
  });
});
