import type { Diagnostic, ErrorCode } from "./interfaces";

export class KeyshiftError extends Error {
  public readonly code: ErrorCode;

  public constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  public toDiagnostic(): Diagnostic {
    return { code: this.code, message: this.message };
  }
}

export class EmptyInputError extends KeyshiftError {
  public constructor(message = "No score fragments were supplied to combine.") {
    super("EMPTY_INPUT", message);
  }
}

export class ParseError extends KeyshiftError {
  public readonly source: string;

  public constructor(source: string, reason: string, options?: { cause?: unknown }) {
    super("PARSE_ERROR", `Failed to parse ${source}: ${reason}`, options);
    this.source = source;
  }
}

export class InvalidIntervalError extends KeyshiftError {
  public readonly interval: string;

  public constructor(interval: string, reason: string) {
    super("INVALID_INTERVAL", `Invalid interval "${interval}": ${reason}`);
    this.interval = interval;
  }
}

export class ConfigError extends KeyshiftError {
  public constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export class ExternalToolError extends KeyshiftError {
  public readonly command: string;
  public readonly stderr: string;

  public constructor(command: string, stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : ".";
    super("EXTERNAL_TOOL_FAILED", `Command failed (${command})${detail}`, options);
    this.command = command;
    this.stderr = stderr;
  }
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

export const toDiagnostic = (value: unknown): Diagnostic => {
  if (value instanceof KeyshiftError) return value.toDiagnostic();
  return { code: "UNEXPECTED_ERROR", message: toError(value).message };
};
