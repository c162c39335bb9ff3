import fs from "node:fs";
import path from "node:path";
import yaml from "yaml";

export type FileFormat = "json" | "yaml";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value && typeof value === "object" && !Array.isArray(value));
}

export function detectFormat(filePath: string): FileFormat {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yml" || ext === ".yaml" ? "yaml" : "json";
}

// JSON is valid YAML, so one parser reads both; an empty file is an empty object.
export function parseDocument(raw: string): Record<string, unknown> {
  if (!raw.trim()) {
    return {};
  }
  const parsed: unknown = yaml.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error("Root must be an object.");
  }
  return parsed;
}

export function stringifyDocument(value: Record<string, unknown>, format: FileFormat): string {
  if (format === "yaml") {
    return `${yaml.stringify(value, { indent: 2 })}`.trimEnd() + "\n";
  }
  return `${JSON.stringify(value, null, 2)}\n`;
}

export function writeDocument(filePath: string, value: Record<string, unknown>): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(filePath, stringifyDocument(value, detectFormat(filePath)), { mode: 0o600 });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
