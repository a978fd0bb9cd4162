import os from "node:os";
import path from "node:path";

const BYTE_UNITS: Record<string, number> = {
  b: 1,
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3
};

export function roundTo(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Parses docker-style sizes such as `32g`, `512m`, `64kb` or a bare byte count. */
export function parseByteSize(raw: string | number): number | undefined {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw > 0 ? raw : undefined;
  }

  const match = raw.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*([bkmg]?)b?$/);
  if (!match) {
    return undefined;
  }
  const bytes = Math.round(Number(match[1]) * BYTE_UNITS[match[2] || "b"]);
  return bytes > 0 ? bytes : undefined;
}

export function formatBytes(value?: number): string {
  if (typeof value !== "number" || Number.isNaN(value)) {
    return "-";
  }
  if (value >= 1024 ** 3) {
    return `${roundTo(value / 1024 ** 3)} GB`;
  }
  if (value >= 1024 ** 2) {
    return `${roundTo(value / 1024 ** 2)} MB`;
  }
  return `${value} B`;
}

/** Accepts POSIX absolute paths and Windows drive paths (`d:/AI/x`, `D:\AI\x`). */
export function isAbsoluteHostPath(value: string): boolean {
  if (/^[a-zA-Z]:[\\/]/.test(value)) {
    return true;
  }
  return path.posix.isAbsolute(value);
}

/** Drive letters compare case-insensitively and separators are unified, so `D:\x` and `d:/x/` collide. */
export function normalizeHostPath(value: string): string {
  let normalized = value.replace(/\\/g, "/");
  if (/^[a-zA-Z]:\//.test(normalized)) {
    normalized = normalized[0].toLowerCase() + normalized.slice(1);
  }
  normalized = path.posix.normalize(normalized);
  return normalized.length > 1 ? normalized.replace(/\/+$/, "") : normalized;
}

export function normalizeInputPath(inputPath: string): string {
  const trimmed = inputPath.trim();
  if (trimmed === "~") {
    return os.homedir();
  }
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  return trimmed;
}

/**
 * Splits a command string into argv the way a POSIX shell would for plain
 * words, single quotes, double quotes and backslash escapes. Returns
 * undefined on an unterminated quote.
 */
export function splitCommandLine(input: string): string[] | undefined {
  const args: string[] = [];
  let current = "";
  let inWord = false;
  let quote: "'" | "\"" | null = null;

  for (let i = 0; i < input.length; i += 1) {
    const char = input[i];

    if (quote === "'") {
      if (char === "'") {
        quote = null;
      } else {
        current += char;
      }
      continue;
    }

    if (quote === "\"") {
      if (char === "\"") {
        quote = null;
      } else if (char === "\\" && i + 1 < input.length && /["\\$`]/.test(input[i + 1])) {
        current += input[i + 1];
        i += 1;
      } else {
        current += char;
      }
      continue;
    }

    if (char === "'" || char === "\"") {
      quote = char;
      inWord = true;
    } else if (char === "\\" && i + 1 < input.length) {
      current += input[i + 1];
      inWord = true;
      i += 1;
    } else if (/\s/.test(char)) {
      if (inWord) {
        args.push(current);
        current = "";
        inWord = false;
      }
    } else {
      current += char;
      inWord = true;
    }
  }

  if (quote) {
    return undefined;
  }
  if (inWord) {
    args.push(current);
  }
  return args;
}

export function parseDockerTimestamp(value: unknown): Date | undefined {
  if (typeof value !== "string" || !value || value.startsWith("0001-01-01")) {
    return undefined;
  }
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
