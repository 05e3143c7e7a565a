// pattern: Imperative Shell

/**
 * ToolSandbox over node:vm.
 * Each run gets a fresh context holding only `args` and `agent_state`. The tool source must
 * define a function named after the tool; its return value (awaited when it is a promise)
 * is the tool result. Synchronous and asynchronous work share one `timeoutMs` budget.
 */

import vm from 'node:vm';
import type { Logger } from '../logging/logger.ts';
import type { SandboxRunRequest, SandboxRunResult, ToolSandbox } from './types.ts';

export type VmSandboxOptions = {
  timeoutMs: number;
  maxSourceSize?: number;
  logger?: Logger;
};

const DEFAULT_MAX_SOURCE_SIZE = 64 * 1024;

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export class SandboxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SandboxError';
  }
}

/**
 * The vm timeout only covers synchronous execution; an async tool is bounded here.
 */
async function settleWithin(returned: unknown, timeoutMs: number, toolName: string): Promise<unknown> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new SandboxError(`tool ${toolName} did not finish within ${timeoutMs}ms`)),
      timeoutMs,
    );
  });
  try {
    return await Promise.race([returned, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export function createVmSandbox(options: VmSandboxOptions): ToolSandbox {
  const maxSourceSize = options.maxSourceSize ?? DEFAULT_MAX_SOURCE_SIZE;

  return {
    async run(request: SandboxRunRequest): Promise<SandboxRunResult> {
      const { toolName, sourceCode } = request;

      if (!IDENTIFIER.test(toolName)) {
        throw new SandboxError(`tool name is not a valid function name: ${toolName}`);
      }
      if (sourceCode.length > maxSourceSize) {
        throw new SandboxError(`tool source exceeds max size of ${maxSourceSize} characters`);
      }

      const context = vm.createContext({
        args: structuredClone(request.args),
        agent_state: structuredClone(request.agentState),
      });
      const script = new vm.Script(
        `${sourceCode}\n;typeof ${toolName} === 'function' ? ${toolName}(args, agent_state) : undefined;`,
        { filename: `${toolName}.tool.js` },
      );

      const startTime = Date.now();
      const returned: unknown = script.runInContext(context, { timeout: options.timeoutMs });
      const remainingMs = Math.max(0, options.timeoutMs - (Date.now() - startTime));
      const value = await settleWithin(returned, remainingMs, toolName);

      const defined: unknown = vm.runInContext(`typeof ${toolName} === 'function'`, context);
      if (defined !== true) {
        throw new SandboxError(`tool source does not define a function named ${toolName}`);
      }

      options.logger?.debug({ toolName, duration_ms: Date.now() - startTime }, 'sandboxed tool finished');
      const finalState: unknown = context['agent_state'];
      return { return_value: value, agent_state: finalState };
    },
  };
}
