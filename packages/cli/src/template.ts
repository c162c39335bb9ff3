import fs from "node:fs";
import {
  DEFAULT_PATH_PATTERN,
  PATH_PATTERNS,
  emptyChangeSet,
  isPathPattern,
  type ChangeSet,
  type PathPattern
} from "@wafctl/core";
import { errorMessage, isRecord, parseDocument } from "./files.js";

export type TemplateFile = {
  site?: string;
  apiKey?: string;
  changes: ChangeSet;
};

export type LoadedTemplate = {
  template: TemplateFile;
  path: string;
  warnings: string[];
};

export class TemplateError extends Error {
  readonly path: string;

  constructor(templatePath: string, message: string) {
    super(message);
    this.name = "TemplateError";
    this.path = templatePath;
  }
}

const LIST_KEYS = ["whitelistIPs", "blacklistIPs", "whitelistSubnets", "blacklistSubnets"] as const;
const PATH_KEYS = ["whitelistPaths", "blacklistPaths"] as const;
const KNOWN_KEYS = new Set<string>(["site", "apiKey", "settings", ...LIST_KEYS, ...PATH_KEYS]);

export function loadTemplate(templatePath: string): LoadedTemplate {
  if (!fs.existsSync(templatePath)) {
    throw new TemplateError(templatePath, `Template file not found at ${templatePath}.`);
  }
  let document: Record<string, unknown>;
  try {
    document = parseDocument(fs.readFileSync(templatePath, "utf8"));
  } catch (err) {
    throw new TemplateError(
      templatePath,
      `Unable to parse template file ${templatePath}, please check its content. ${errorMessage(err)}`
    );
  }
  const normalized = normalizeTemplate(document);
  if (normalized.errors.length > 0) {
    throw new TemplateError(templatePath, `Invalid template ${templatePath}: ${normalized.errors.join(" ")}`);
  }
  return { template: normalized.template, path: templatePath, warnings: normalized.warnings };
}

export function normalizeTemplate(document: Record<string, unknown>): {
  template: TemplateFile;
  warnings: string[];
  errors: string[];
} {
  const warnings: string[] = [];
  const errors: string[] = [];
  const changes = emptyChangeSet();
  const template: TemplateFile = { changes };

  for (const key of Object.keys(document)) {
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`Ignoring unknown template key "${key}".`);
    }
  }

  const site = readOptionalString(document, "site", warnings);
  if (site) {
    template.site = site;
  }
  const apiKey = readOptionalString(document, "apiKey", warnings);
  if (apiKey) {
    template.apiKey = apiKey;
  }

  for (const key of LIST_KEYS) {
    changes[key] = readStringList(document[key], key, warnings);
  }
  for (const key of PATH_KEYS) {
    changes[key] = readPathMap(document[key], key, warnings, errors);
  }
  changes.settings = readSettings(document.settings, warnings);

  return { template, warnings, errors };
}

function readOptionalString(
  document: Record<string, unknown>,
  key: string,
  warnings: string[]
): string | undefined {
  const value = document[key];
  if (typeof value === "undefined") {
    return undefined;
  }
  if (typeof value !== "string") {
    warnings.push(`Template ${key} must be a string; ignoring it.`);
    return undefined;
  }
  return value.trim() || undefined;
}

function readStringList(value: unknown, key: string, warnings: string[]): string[] {
  if (typeof value === "undefined") {
    return [];
  }
  if (!Array.isArray(value)) {
    warnings.push(`Template ${key} must be a list of strings; ignoring it.`);
    return [];
  }
  const entries: string[] = [];
  value.forEach((entry, index) => {
    if (typeof entry === "string" && entry.trim()) {
      entries.push(entry.trim());
    } else {
      warnings.push(`Template ${key}[${index}] is not a non-empty string; skipping it.`);
    }
  });
  return entries;
}

function readPathMap(
  value: unknown,
  key: string,
  warnings: string[],
  errors: string[]
): Record<string, PathPattern> {
  const paths: Record<string, PathPattern> = {};
  if (typeof value === "undefined") {
    return paths;
  }
  if (!isRecord(value)) {
    warnings.push(`Template ${key} must map URL paths to patterns; ignoring it.`);
    return paths;
  }
  for (const [urlPath, rawPattern] of Object.entries(value)) {
    const pattern = typeof rawPattern === "string" ? rawPattern.trim().toLowerCase() : rawPattern;
    if (pattern === "" || pattern === null || typeof pattern === "undefined") {
      paths[urlPath] = DEFAULT_PATH_PATTERN;
    } else if (isPathPattern(pattern)) {
      paths[urlPath] = pattern;
    } else {
      errors.push(`${key} "${urlPath}" has pattern ${JSON.stringify(rawPattern)}; expected one of ${PATH_PATTERNS.join(", ")}.`);
    }
  }
  return paths;
}

function readSettings(value: unknown, warnings: string[]): Record<string, string> {
  const settings: Record<string, string> = {};
  if (typeof value === "undefined") {
    return settings;
  }
  if (!isRecord(value)) {
    warnings.push("Template settings must map setting names to values; ignoring it.");
    return settings;
  }
  for (const [name, raw] of Object.entries(value)) {
    if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
      settings[name] = String(raw).trim();
    } else {
      warnings.push(`Template setting "${name}" must be a string, number or boolean; skipping it.`);
    }
  }
  return settings;
}
