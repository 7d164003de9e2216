/**
 * Prefixes Node.js console output with UTC timestamps so every line written by
 * a harvest run reads like "[2024-05-01T12:34:56.789Z] [harvest] message".
 * Core components never log through the console directly; they receive a
 * `HarvestLogger` and the CLI hands them one built by `createConsoleLogger`.
 */
export type HarvestLogger = (message: string) => void;

type ConsoleMethod = "log" | "info" | "warn" | "error" | "debug";

export function formatWithTimestamp(
  args: unknown[],
  now: Date = new Date(),
): unknown[] {
  const timestamp = now.toISOString();
  if (args.length === 0) {
    return [`[${timestamp}]`];
  }

  const [first, ...rest] = args;
  if (typeof first === "string") {
    return [`[${timestamp}] ${first}`, ...rest];
  }

  return [`[${timestamp}]`, first, ...rest];
}

export function createConsoleLogger(
  scope: string,
  method: Exclude<ConsoleMethod, "log" | "debug"> = "info",
): HarvestLogger {
  return (message) => {
    console[method](`[${scope}] ${message}`);
  };
}

const marker = "__repoHarvesterConsolePatched";
const consoleWithMarker = console as typeof console & Record<string, boolean>;

if (!process.env.VITEST && !consoleWithMarker[marker]) {
  const methods: ConsoleMethod[] = ["log", "info", "warn", "error", "debug"];
  for (const method of methods) {
    const original = console[method].bind(console);
    console[method] = (...args: unknown[]) => {
      original(...formatWithTimestamp(args));
    };
  }
  consoleWithMarker[marker] = true;
}
