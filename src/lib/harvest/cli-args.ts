export type HarvestCliOptions = {
  input: string | null;
  concurrency: number | null;
  failureLog: string | null;
};

const FLAGS = ["--input", "--concurrency", "--failure-log"] as const;
type Flag = (typeof FLAGS)[number];

function isFlag(value: string): value is Flag {
  return FLAGS.some((flag) => flag === value);
}

function parsePositiveInteger(flag: string, value: string) {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, received "${value}".`);
  }
  return parsed;
}

/**
 * Accepts `--flag value` and `--flag=value` for every option. Anything else is
 * an error rather than silently ignored.
 */
export function parseHarvestArgs(args: readonly string[]): HarvestCliOptions {
  const options: HarvestCliOptions = {
    input: null,
    concurrency: null,
    failureLog: null,
  };

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? "";
    const separator = arg.indexOf("=");
    const name = separator >= 0 ? arg.slice(0, separator) : arg;
    if (!isFlag(name)) {
      throw new Error(`Unknown argument "${arg}".`);
    }

    let value: string | undefined;
    if (separator >= 0) {
      value = arg.slice(separator + 1);
    } else {
      value = args[index + 1];
      index += 1;
    }

    const trimmed = value?.trim() ?? "";
    if (!trimmed) {
      throw new Error(`${name} expects a value.`);
    }

    switch (name) {
      case "--input":
        options.input = trimmed;
        break;
      case "--concurrency":
        options.concurrency = parsePositiveInteger(name, trimmed);
        break;
      case "--failure-log":
        options.failureLog = trimmed;
        break;
    }
  }

  return options;
}
