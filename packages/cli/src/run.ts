import { planChanges, type ChangeSource, type PlanOptions, type WafChange } from "@wafctl/core";
import {
  SucuriClient,
  submitAll,
  toSucuriRequest,
  type FetchLike,
  type SubmitAllOptions,
  type SubmitSummary,
  type SucuriClientOptions,
  type SucuriResponse
} from "@wafctl/sucuri-client";
import yaml from "yaml";
import {
  ConfigError,
  loadSiteConfig,
  resolveConfigPath,
  resolveCredentials,
  type CredentialFlags,
  type Credentials,
  type LoadedSiteConfig
} from "./config.js";
import { errorMessage } from "./files.js";
import { buildFlagChangeSet, type ChangeFlags } from "./flags.js";
import { TemplateError, loadTemplate, type TemplateFile } from "./template.js";
import { EXIT_INVALID_INPUT, EXIT_OK, EXIT_REQUEST_FAILED, type CliLogger, type ExitCode } from "./types.js";

export type ConnectionOptions = CredentialFlags & {
  config?: string;
  apiUrl?: string;
  timeoutMs?: number;
};

export type ApplyOptions = ConnectionOptions &
  ChangeFlags & {
    template?: string;
    remove?: boolean;
    dryRun?: boolean;
    concurrency?: number;
    maxHosts?: number;
  };

export type RunDeps = {
  logger?: CliLogger;
  fetch?: FetchLike;
  cwd?: string;
};

export type ApplyResult = {
  exitCode: ExitCode;
  planned: WafChange[];
  summary?: SubmitSummary<SucuriResponse>;
};

type SiteConfigResult = { ok: true; loaded: LoadedSiteConfig } | { ok: false };

function loadConfigFor(options: ConnectionOptions, deps: RunDeps): SiteConfigResult {
  const logger = deps.logger;
  const configPath = resolveConfigPath(options.config, deps.cwd);
  try {
    const loaded = loadSiteConfig(configPath);
    if (!loaded.existed && options.config) {
      logger?.error?.(`Config file not found at ${configPath}.`);
      return { ok: false };
    }
    loaded.warnings.forEach((warning) => logger?.warn?.(warning));
    return { ok: true, loaded };
  } catch (err) {
    if (err instanceof ConfigError) {
      logger?.error?.(err.message);
      return { ok: false };
    }
    throw err;
  }
}

function createClient(credentials: Credentials, options: ConnectionOptions, deps: RunDeps): SucuriClient {
  const clientOptions: SucuriClientOptions = { apiKey: credentials.apiKey, apiSecret: credentials.apiSecret };
  if (options.apiUrl) {
    clientOptions.apiUrl = options.apiUrl;
  }
  if (typeof options.timeoutMs === "number") {
    clientOptions.timeoutMs = options.timeoutMs;
  }
  if (deps.fetch) {
    clientOptions.fetch = deps.fetch;
  }
  return new SucuriClient(clientOptions);
}

/**
 * Apply whitelist, blacklist and settings changes from flags and an optional template.
 *
 * Exit codes: 0 when every request succeeded or there was nothing to do, 1 when
 * at least one request failed, 2 on invalid input.
 */
export async function runApply(options: ApplyOptions, deps: RunDeps = {}): Promise<ApplyResult> {
  const logger = deps.logger;
  const invalid = (): ApplyResult => ({ exitCode: EXIT_INVALID_INPUT, planned: [] });

  const configResult = loadConfigFor(options, deps);
  if (!configResult.ok) {
    return invalid();
  }

  let template: TemplateFile | undefined;
  if (options.template) {
    try {
      const loaded = loadTemplate(options.template);
      loaded.warnings.forEach((warning) => logger?.warn?.(warning));
      template = loaded.template;
    } catch (err) {
      if (err instanceof TemplateError) {
        logger?.error?.(err.message);
        return invalid();
      }
      throw err;
    }
  }

  const credentialParams: Parameters<typeof resolveCredentials>[0] = {
    flags: options,
    config: configResult.loaded.config
  };
  if (template) {
    credentialParams.template = template;
  }
  const credentials = resolveCredentials(credentialParams);
  if (!credentials.ok && !options.dryRun) {
    logger?.error?.(credentials.error);
    return invalid();
  }
  if (!credentials.ok) {
    logger?.warn?.(`Credentials not resolved: ${credentials.error}`);
  } else {
    credentials.warnings.forEach((warning) => logger?.warn?.(warning));
  }

  const flagChanges = buildFlagChangeSet(options);
  if (flagChanges.errors.length > 0) {
    flagChanges.errors.forEach((error) => logger?.error?.(error));
    return invalid();
  }

  const sources: ChangeSource[] = [{ origin: "flag", changes: flagChanges.changes }];
  if (template) {
    sources.push({ origin: "template", changes: template.changes });
  }
  const planOptions: PlanOptions = { remove: options.remove === true };
  if (typeof options.maxHosts === "number") {
    planOptions.maxHosts = options.maxHosts;
  }
  const plan = planChanges(sources, planOptions);
  plan.warnings.forEach((warning) => logger?.warn?.(warning));
  if (plan.errors.length > 0) {
    plan.errors.forEach((error) => logger?.error?.(error));
    return invalid();
  }
  if (plan.changes.length === 0) {
    logger?.info?.("Nothing to apply.");
    return { exitCode: EXIT_OK, planned: [] };
  }

  const requests = plan.changes.map(toSucuriRequest);
  if (options.dryRun || !credentials.ok) {
    logger?.info?.(`Dry run: ${requests.length} request(s) would be sent.`);
    requests.forEach((request) => logger?.info?.(`  ${request.action}  ${request.description}`));
    return { exitCode: EXIT_OK, planned: plan.changes };
  }

  const target = credentials.credentials.site ? ` for ${credentials.credentials.site}` : "";
  logger?.info?.(`Submitting ${requests.length} request(s)${target}.`);
  const client = createClient(credentials.credentials, options, deps);
  const submitOptions: SubmitAllOptions<SucuriResponse> = {
    onOutcome: (outcome) => {
      if (outcome.ok) {
        logger?.info?.(`OK    ${outcome.request.description}`);
      } else {
        logger?.error?.(`FAIL  ${outcome.error.message}`);
      }
    }
  };
  if (typeof options.concurrency === "number") {
    submitOptions.concurrency = options.concurrency;
  }
  const summary = await submitAll(requests, (request) => client.submit(request), submitOptions);
  logger?.info?.(`${summary.succeeded} of ${requests.length} request(s) succeeded.`);

  return {
    exitCode: summary.failed > 0 ? EXIT_REQUEST_FAILED : EXIT_OK,
    planned: plan.changes,
    summary
  };
}

async function withClient(
  options: ConnectionOptions,
  deps: RunDeps,
  action: (client: SucuriClient) => Promise<SucuriResponse>,
  onSuccess: (response: SucuriResponse) => void
): Promise<ExitCode> {
  const logger = deps.logger;
  const configResult = loadConfigFor(options, deps);
  if (!configResult.ok) {
    return EXIT_INVALID_INPUT;
  }
  const credentials = resolveCredentials({ flags: options, config: configResult.loaded.config });
  if (!credentials.ok) {
    logger?.error?.(credentials.error);
    return EXIT_INVALID_INPUT;
  }
  credentials.warnings.forEach((warning) => logger?.warn?.(warning));
  try {
    onSuccess(await action(createClient(credentials.credentials, options, deps)));
    return EXIT_OK;
  } catch (err) {
    logger?.error?.(errorMessage(err));
    return EXIT_REQUEST_FAILED;
  }
}

// Print the current WAF settings as YAML.
export async function runShow(options: ConnectionOptions, deps: RunDeps = {}): Promise<ExitCode> {
  return withClient(
    options,
    deps,
    (client) => client.showSettings(),
    (response) => deps.logger?.info?.(formatSettingsOutput(response.output))
  );
}

export async function runClearCache(options: ConnectionOptions, deps: RunDeps = {}): Promise<ExitCode> {
  return withClient(
    options,
    deps,
    (client) => client.clearCache(),
    (response) => {
      const detail = response.messages.length > 0 ? response.messages.join("; ") : "Cache cleared.";
      deps.logger?.info?.(detail);
    }
  );
}

// Site names only; secrets never leave the config file.
export function runListSites(options: Pick<ConnectionOptions, "config">, deps: RunDeps = {}): ExitCode {
  const logger = deps.logger;
  const configResult = loadConfigFor(options, deps);
  if (!configResult.ok) {
    return EXIT_INVALID_INPUT;
  }
  const { loaded } = configResult;
  const sites = Object.keys(loaded.config.sites).sort();
  if (!loaded.existed) {
    logger?.info?.(`No config file at ${loaded.path}. Run \`wafctl init\` to create one.`);
    return EXIT_OK;
  }
  if (sites.length === 0) {
    logger?.info?.(`No sites configured in ${loaded.path}.`);
    return EXIT_OK;
  }
  logger?.info?.(`Sites in ${loaded.path}:`);
  sites.forEach((site) => logger?.info?.(`  ${site}`));
  logger?.info?.(loaded.config.apiKey ? "API key: configured" : "API key: not configured");
  return EXIT_OK;
}

export function formatSettingsOutput(output: unknown): string {
  if (output === null || typeof output === "undefined") {
    return "No settings returned.";
  }
  return yaml.stringify(output, { indent: 2 }).trimEnd();
}
