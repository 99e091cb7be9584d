import type { LogLevel } from "./config/engine_config";

type Fields = Record<string, string | number | bigint | boolean | undefined>;

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// `[SCOPE] [EVENT] [key=value] ...`
export function formatLine(scope: string, event: string, fields: Fields = {}): string {
  const parts = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `[${k}=${String(v)}]`);
  return [`[${scope}]`, `[${event}]`, ...parts].join(" ");
}

export class Logger {
  private readonly scope: string;
  private level: LogLevel;

  constructor(scope: string, level: LogLevel = "warn") {
    this.scope = scope;
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, this.level);
  }

  enabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[this.level] && level !== "silent";
  }

  debug(event: string, fields?: Fields): void {
    if (this.enabled("debug")) console.debug(formatLine(this.scope, event, fields));
  }

  info(event: string, fields?: Fields): void {
    if (this.enabled("info")) console.log(formatLine(this.scope, event, fields));
  }

  warn(event: string, fields?: Fields): void {
    if (this.enabled("warn")) console.warn(`⚠️  ${formatLine(this.scope, event, fields)}`);
  }

  error(event: string, fields?: Fields): void {
    if (this.enabled("error")) console.error(`❌ ${formatLine(this.scope, event, fields)}`);
  }
}
