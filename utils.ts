import { spawn } from "node:child_process";

type RunCommandOptions = {
  allowFailure?: boolean;
  logCommand?: (command: string[]) => void;
};

export type CommandResult = {
  stdout: string;
  stderr: string;
  exitCode: number;
};

export function formatCommand(command: string[]) {
  return command
    .map((part) => (part.includes(" ") ? `"${part}"` : part))
    .join(" ");
}

export async function runCommand(
  command: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  const [file, ...args] = command;
  if (!file) {
    throw new Error("Command is empty");
  }
  options.logCommand?.(command);

  const result = await new Promise<CommandResult>((resolve, reject) => {
    const proc = spawn(file, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    proc.stdout.setEncoding("utf8");
    proc.stderr.setEncoding("utf8");
    proc.stdout.on("data", (chunk: string) => {
      stdout += chunk;
    });
    proc.stderr.on("data", (chunk: string) => {
      stderr += chunk;
    });
    proc.once("error", reject);
    proc.once("close", (code) => {
      resolve({ stdout, stderr, exitCode: code ?? -1 });
    });
  });

  if (result.exitCode !== 0 && !options.allowFailure) {
    throw new Error(
      `Command failed (${result.exitCode}): ${formatCommand(command)}\n${result.stderr}`,
    );
  }

  return result;
}

export function clamp(value: number, min: number, max: number) {
  return Math.min(Math.max(value, min), max);
}

export function formatBytes(bytes: number) {
  const units = ["B", "KB", "MB", "GB", "TB"];
  let value = Math.max(bytes, 0);
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex += 1;
  }
  const digits = unitIndex === 0 ? 0 : 1;
  return `${value.toFixed(digits)} ${units[unitIndex]}`;
}
