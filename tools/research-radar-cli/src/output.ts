import pc from "picocolors";

export interface CommandResult {
  payload: unknown;
  lines: string[];
}

export function printCommandResult(result: CommandResult, jsonMode: boolean): void {
  if (jsonMode) {
    process.stdout.write(`${JSON.stringify(result.payload, null, 2)}\n`);
    return;
  }
  for (const line of result.lines) {
    process.stdout.write(`${line}\n`);
  }
}

export function successLine(text: string): string {
  return `${pc.green("✔")} ${text}`;
}

export function warnLine(text: string): string {
  return `${pc.yellow("!")} ${text}`;
}

export function fieldLine(label: string, value: unknown): string {
  return `${pc.dim(`${label}:`)} ${String(value ?? "-")}`;
}
