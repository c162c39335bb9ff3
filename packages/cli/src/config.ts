import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { resolveValue } from "@wafctl/core";
import { errorMessage, isRecord, parseDocument, writeDocument } from "./files.js";

export type SiteConfig = {
  apiKey?: string;
  /** Site name to API secret. */
  sites: Record<string, string>;
};

export type LoadedSiteConfig = {
  config: SiteConfig;
  path: string;
  existed: boolean;
  warnings: string[];
};

export type CredentialFlags = {
  key?: string;
  secret?: string;
  site?: string;
};

export type TemplateCredentials = {
  apiKey?: string;
  site?: string;
};

export type Credentials = {
  apiKey: string;
  apiSecret: string;
  site?: string;
};

export type CredentialResult =
  | { ok: true; credentials: Credentials; warnings: string[] }
  | { ok: false; error: string };

export class ConfigError extends Error {
  readonly path: string;

  constructor(configPath: string, message: string) {
    super(message);
    this.name = "ConfigError";
    this.path = configPath;
  }
}

export const CONFIG_PATH_ENV = "WAFCTL_CONFIG";
export const LOCAL_CONFIG_FILENAME = "wafctl.json";
const DEFAULT_CONFIG_PATH = path.join(os.homedir(), ".wafctl", "config.json");

export function getDefaultConfigPath(): string {
  return DEFAULT_CONFIG_PATH;
}

// --config, then WAFCTL_CONFIG, then ./wafctl.json when present, then ~/.wafctl/config.json.
export function resolveConfigPath(override?: string, cwd = process.cwd()): string {
  if (override && override.trim()) {
    return override.trim();
  }
  const envPath = process.env[CONFIG_PATH_ENV]?.trim();
  if (envPath) {
    return envPath;
  }
  const localPath = path.join(cwd, LOCAL_CONFIG_FILENAME);
  if (fs.existsSync(localPath)) {
    return localPath;
  }
  return DEFAULT_CONFIG_PATH;
}

export function emptySiteConfig(): SiteConfig {
  return { sites: {} };
}

export function loadSiteConfig(configPath: string): LoadedSiteConfig {
  if (!fs.existsSync(configPath)) {
    return { config: emptySiteConfig(), path: configPath, existed: false, warnings: [] };
  }
  let document: Record<string, unknown>;
  try {
    document = parseDocument(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new ConfigError(
      configPath,
      `Unable to parse config file ${configPath}, please check its content. ${errorMessage(err)}`
    );
  }
  const warnings: string[] = [];
  return { config: normalizeSiteConfig(document, warnings), path: configPath, existed: true, warnings };
}

export function normalizeSiteConfig(document: Record<string, unknown>, warnings: string[]): SiteConfig {
  const config = emptySiteConfig();
  for (const key of Object.keys(document)) {
    if (key !== "apiKey" && key !== "sites") {
      warnings.push(`Ignoring unknown config key "${key}".`);
    }
  }
  if (typeof document.apiKey === "string") {
    if (document.apiKey.trim()) {
      config.apiKey = document.apiKey.trim();
    }
  } else if (typeof document.apiKey !== "undefined") {
    warnings.push("Config apiKey must be a string; ignoring it.");
  }
  if (isRecord(document.sites)) {
    for (const [site, secret] of Object.entries(document.sites)) {
      if (typeof secret === "string" && secret.trim()) {
        config.sites[site] = secret.trim();
      } else {
        warnings.push(`Config site "${site}" has no API secret; ignoring it.`);
      }
    }
  } else if (typeof document.sites !== "undefined") {
    warnings.push("Config sites must map site names to API secrets; ignoring it.");
  }
  return config;
}

export function writeSiteConfig(configPath: string, config: SiteConfig): void {
  const document: Record<string, unknown> = {};
  if (config.apiKey) {
    document.apiKey = config.apiKey;
  }
  document.sites = config.sites;
  writeDocument(configPath, document);
}

/**
 * Work out the API key and secret for this run.
 *
 * The key comes from --key, the template or the config file, in that order.
 * The secret is either given with --secret or looked up by site name (--site,
 * then the template's site) in the config file; --secret and --site together
 * are rejected.
 */
export function resolveCredentials(params: {
  flags: CredentialFlags;
  template?: TemplateCredentials;
  config: SiteConfig;
}): CredentialResult {
  const { flags, template, config } = params;
  const warnings: string[] = [];

  const apiKey = resolveValue(flags.key, template?.apiKey, config.apiKey);
  if (!apiKey) {
    return {
      ok: false,
      error: `API key wasn't provided, and it was not found in config file. (use --key '<key>', or add "apiKey": "<apiKey>" to config file)`
    };
  }

  const flagSecret = resolveValue(flags.secret);
  const flagSite = resolveValue(flags.site);
  if (flagSecret && flagSite) {
    return { ok: false, error: "Only use --secret or --site, not both." };
  }
  if (flagSecret) {
    const templateSite = resolveValue(template?.site);
    if (templateSite) {
      warnings.push(`Template site "${templateSite}" ignored because --secret was given.`);
    }
    return { ok: true, credentials: { apiKey, apiSecret: flagSecret }, warnings };
  }

  const site = resolveValue(flagSite, template?.site);
  if (!site) {
    return { ok: false, error: "No API secret or site was provided. (use --secret '<secret>' or --site '<site>')" };
  }
  const apiSecret = config.sites[site];
  if (!apiSecret) {
    return { ok: false, error: `Site '${site}' not found in config file.` };
  }
  return { ok: true, credentials: { apiKey, apiSecret, site }, warnings };
}
