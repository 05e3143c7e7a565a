// pattern: Imperative Shell

import { describe, it, expect } from 'vitest';
import { createTestAgentState } from '../integration/test-helpers.ts';
import { createVmSandbox, SandboxError } from './vm-sandbox.ts';

describe('createVmSandbox', () => {
  const sandbox = createVmSandbox({ timeoutMs: 200 });

  it('returns the function result and the snapshot it was given', async () => {
    const result = await sandbox.run({
      toolName: 'add',
      sourceCode: 'function add(args) { return args.a + args.b; }',
      args: { a: 2, b: 3 },
      agentState: createTestAgentState(),
    });

    expect(result.return_value).toBe(5);
    expect(result.agent_state).toEqual(createTestAgentState());
  });

  it('awaits async tools', async () => {
    const result = await sandbox.run({
      toolName: 'later',
      sourceCode: 'async function later(args) { return `got ${args.word}`; }',
      args: { word: 'it' },
      agentState: createTestAgentState(),
    });

    expect(result.return_value).toBe('got it');
  });

  it('edits only the copy of agent state', async () => {
    const agentState = createTestAgentState();

    const result = await sandbox.run({
      toolName: 'rename',
      sourceCode:
        'function rename(args, agent_state) {' +
        ' agent_state.memory.blocks.find((b) => b.label === "human").value = "Name: " + args.name;' +
        ' return "done"; }',
      args: { name: 'Alex' },
      agentState,
    });

    expect(agentState.memory.blocks[1]?.value).toBe('Name: Sam');
    expect(result.agent_state).toMatchObject({
      memory: { blocks: [{ label: 'persona' }, { label: 'human', value: 'Name: Alex' }] },
    });
  });

  it('has no access to the host process', async () => {
    const result = await sandbox.run({
      toolName: 'probe',
      sourceCode: 'function probe() { return typeof process + "/" + typeof require; }',
      args: {},
      agentState: createTestAgentState(),
    });

    expect(result.return_value).toBe('undefined/undefined');
  });

  it('rejects source that does not define the tool function', async () => {
    await expect(
      sandbox.run({ toolName: 'missing', sourceCode: 'const x = 1;', args: {}, agentState: createTestAgentState() }),
    ).rejects.toThrow('tool source does not define a function named missing');
  });

  it('rejects tool names that are not identifiers', async () => {
    await expect(
      sandbox.run({ toolName: 'a-b', sourceCode: '', args: {}, agentState: createTestAgentState() }),
    ).rejects.toBeInstanceOf(SandboxError);
  });

  it('stops runaway synchronous code at the timeout', async () => {
    await expect(
      sandbox.run({
        toolName: 'spin',
        sourceCode: 'function spin() { while (true) {} }',
        args: {},
        agentState: createTestAgentState(),
      }),
    ).rejects.toThrow('Script execution timed out');
  });

  it('stops an async tool that never settles at the timeout', async () => {
    const run = createVmSandbox({ timeoutMs: 50 }).run({
      toolName: 'hang',
      sourceCode: 'async function hang() { await new Promise(() => {}); }',
      args: {},
      agentState: createTestAgentState(),
    });

    await expect(run).rejects.toBeInstanceOf(SandboxError);
    await expect(run).rejects.toThrow(/^tool hang did not finish within \d+ms$/);
  });

  it('propagates errors thrown by the tool', async () => {
    await expect(
      sandbox.run({
        toolName: 'boom',
        sourceCode: 'function boom() { throw new RangeError("too far"); }',
        args: {},
        agentState: createTestAgentState(),
      }),
    ).rejects.toMatchObject({ name: 'RangeError', message: 'too far' });
  });
});
