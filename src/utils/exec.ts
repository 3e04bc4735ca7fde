import { $ } from "zx";

export interface CommandOptions {
  cwd?: string;
  /** Echo the command and its output to the terminal while it runs. */
  stream?: boolean;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (command: string, args: readonly string[], options?: CommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = async (command, args, options = {}) => {
  const stream = options.stream ?? false;
  const output = await $({ cwd: options.cwd, nothrow: true, quiet: !stream, verbose: stream })`${command} ${args}`;
  return { exitCode: output.exitCode, stdout: output.stdout, stderr: output.stderr };
};

export function commandOutput(result: CommandResult): string {
  return [result.stderr.trim(), result.stdout.trim()].filter(Boolean).join("\n");
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}
