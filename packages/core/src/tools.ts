import { execa } from "execa";

export type ToolInvocation = {
  command: string;
  args: readonly string[];
  cwd: string;
  /** 0 disables the time-out. */
  timeoutMs: number;
};

export type ToolOutcome = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type ToolRunner = (invocation: ToolInvocation) => Promise<ToolOutcome>;

export const execaToolRunner: ToolRunner = async (invocation) => {
  const result = await execa(invocation.command, [...invocation.args], {
    cwd: invocation.cwd,
    reject: false,
    timeout: invocation.timeoutMs,
  });
  return {
    exitCode: result.exitCode ?? -1,
    stdout: String(result.stdout),
    stderr: String(result.stderr),
    timedOut: result.timedOut,
  };
};
