import chalk from "chalk";

export type ErrorCode =
  | "file_not_found"
  | "permission_denied"
  | "invalid_yaml"
  | "invalid_document"
  | "not_found"
  | "invalid_option"
  | "load_failed"
  | "write_failed";

export function exitCodeFor(code: ErrorCode): number {
  switch (code) {
    case "file_not_found":
    case "not_found":
      return 4;
    case "permission_denied":
      return 5;
    case "invalid_yaml":
    case "invalid_document":
      return 3;
    default:
      return 1;
  }
}

/**
 * Report an error and exit. JSON output gets a structured error object on
 * stdout; everything else a red line on stderr.
 */
export function reportError(format: string | undefined, code: ErrorCode, message: string): never {
  if (format === "json") {
    console.log(JSON.stringify({ error: { code, message } }, null, 2));
  } else {
    console.error(chalk.red(`error: ${message}`));
  }
  process.exit(exitCodeFor(code));
}

export function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const parts = value.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
  if (parts.length === 0) return undefined;
  return parts;
}

export function parseIndex(raw: string): number | undefined {
  if (!/^\d+$/.test(raw.trim())) return undefined;
  return parseInt(raw, 10);
}

export function plural(count: number, word: string, pluralWord = `${word}s`): string {
  return `${count} ${count === 1 ? word : pluralWord}`;
}
