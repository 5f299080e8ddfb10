import { createLogger, toUserMessage } from "@citeqa/core";

const log = createLogger("cli");

export function getArg(name: string): string | null {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1) return null;
  return process.argv[idx + 1] ?? null;
}

/**
 * Pass WITHOUT the leading "--"
 * Example: hasFlag("restore") checks for "--restore"
 */
export function hasFlag(flag: string): boolean {
  return process.argv.includes(`--${flag}`);
}

export function usage(text: string): never {
  console.error(text);
  process.exit(1);
}

/** Prints the user-facing message, keeps the detail in the log, sets a failing exit code. */
export function reportFailure(scope: string, err: unknown): void {
  log.error(`${scope} failed`, { error: err instanceof Error ? `${err.name}: ${err.message}` : String(err) });
  console.error(`[${scope}] ${toUserMessage(err)}`);
  process.exitCode = 1;
}
