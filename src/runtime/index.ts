// pattern: Functional Core

export type { SandboxRunRequest, SandboxRunResult, ToolSandbox } from './types.ts';
export type { VmSandboxOptions } from './vm-sandbox.ts';
export { createVmSandbox, SandboxError } from './vm-sandbox.ts';
