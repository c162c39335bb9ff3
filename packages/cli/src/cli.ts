import { Command } from "commander";
import { DEFAULT_MAX_HOSTS, formatSettingsHelp } from "@wafctl/core";
import { DEFAULT_CONCURRENCY, type FetchLike } from "@wafctl/sucuri-client";
import { ConfigError } from "./config.js";
import { isRecord } from "./files.js";
import {
  runApply,
  runClearCache,
  runListSites,
  runShow,
  type ApplyOptions,
  type ConnectionOptions,
  type RunDeps
} from "./run.js";
import { runInitWizard, WizardCancelledError, type InitWizardOptions } from "./wizard.js";
import { EXIT_INVALID_INPUT, EXIT_OK, type CliLogger, type ExitCode } from "./types.js";

export type WafCliOptions = {
  logger?: CliLogger;
  fetch?: FetchLike;
  cwd?: string;
};

// Register the wafctl commands on a commander program.
export function registerWafCli(program: Command, options: WafCliOptions = {}): void {
  const logger = options.logger;
  const deps: RunDeps = {};
  if (logger) {
    deps.logger = logger;
  }
  if (options.fetch) {
    deps.fetch = options.fetch;
  }
  if (options.cwd) {
    deps.cwd = options.cwd;
  }

  const withConnectionOptions = (command: Command): Command =>
    command
      .option("--key <key>", "Sucuri API key (falls back to the template, then the config file)")
      .option("--secret <secret>", "Sucuri API secret for the site")
      .option("--site <site>", "Site name whose API secret is stored in the config file")
      .option("--config <path>", "Config file path (default: $WAFCTL_CONFIG, ./wafctl.json, ~/.wafctl/config.json)")
      .option("--api-url <url>", "Sucuri API endpoint")
      .option("--timeout <ms>", "Request timeout in milliseconds");

  withConnectionOptions(
    program
      .command("apply")
      .description("Whitelist or blacklist IPs, subnets and URL paths, and update WAF settings")
  )
    .option("--template <path>", "Apply every whitelist, blacklist and setting in a template file")
    .option("--whitelist-ip <ips>", "IP or comma separated IPs, e.g. 200.0.0.1,200.0.0.10")
    .option("--blacklist-ip <ips>", "IP or comma separated IPs")
    .option("--whitelist-subnet <subnets>", "Subnet(s) expanded to their hosts, e.g. 200.0.0.0/27,200.0.1.0/30")
    .option("--blacklist-subnet <subnets>", "Subnet(s) expanded to their hosts")
    .option("--whitelist-path <path...>", "URL path, optionally path:pattern (begins_with|ends_with|equals|matches)")
    .option("--blacklist-path <path...>", "URL path, optionally path:pattern")
    .option("--setting <name=value...>", "WAF setting to update (see `wafctl settings`)")
    .option("--delete", "Remove entries instead of adding them (settings can't be removed)")
    .option("--dry-run", "Print the requests without sending them")
    .option("--concurrency <n>", `Requests in flight at once, 0 for all (default ${DEFAULT_CONCURRENCY})`)
    .option("--max-hosts <n>", `Largest subnet expansion allowed (default ${DEFAULT_MAX_HOSTS})`)
    .action(async (...args: unknown[]) => {
      const opts = getOptions(args);
      const connection = readConnectionOptions(opts);
      if (!connection.ok) {
        logger?.error?.(connection.error);
        setExitCode(EXIT_INVALID_INPUT);
        return;
      }
      const applyOptions: ApplyOptions = { ...connection.connection };
      const template = readString(opts.template);
      if (template) {
        applyOptions.template = template;
      }
      const listFlags = [
        ["whitelistIp", opts.whitelistIp],
        ["blacklistIp", opts.blacklistIp],
        ["whitelistSubnet", opts.whitelistSubnet],
        ["blacklistSubnet", opts.blacklistSubnet]
      ] as const;
      for (const [key, value] of listFlags) {
        const text = readString(value);
        if (text) {
          applyOptions[key] = text;
        }
      }
      const whitelistPath = readStringList(opts.whitelistPath);
      if (whitelistPath.length > 0) {
        applyOptions.whitelistPath = whitelistPath;
      }
      const blacklistPath = readStringList(opts.blacklistPath);
      if (blacklistPath.length > 0) {
        applyOptions.blacklistPath = blacklistPath;
      }
      const setting = readStringList(opts.setting);
      if (setting.length > 0) {
        applyOptions.setting = setting;
      }
      applyOptions.remove = opts.delete === true;
      applyOptions.dryRun = opts.dryRun === true;

      const concurrency = parseCount(opts.concurrency, { allowZero: true });
      const maxHosts = parseCount(opts.maxHosts, { allowZero: false });
      if (concurrency === null || maxHosts === null) {
        logger?.error?.("--concurrency and --max-hosts take whole numbers (--max-hosts at least 1).");
        setExitCode(EXIT_INVALID_INPUT);
        return;
      }
      if (typeof concurrency === "number") {
        applyOptions.concurrency = concurrency;
      }
      if (typeof maxHosts === "number") {
        applyOptions.maxHosts = maxHosts;
      }

      const result = await runApply(applyOptions, deps);
      setExitCode(result.exitCode);
    });

  withConnectionOptions(program.command("show").description("Print the current WAF settings")).action(
    async (...args: unknown[]) => {
      const connection = readConnectionOptions(getOptions(args));
      if (!connection.ok) {
        logger?.error?.(connection.error);
        setExitCode(EXIT_INVALID_INPUT);
        return;
      }
      setExitCode(await runShow(connection.connection, deps));
    }
  );

  withConnectionOptions(program.command("clear-cache").description("Clear the WAF cache for the site")).action(
    async (...args: unknown[]) => {
      const connection = readConnectionOptions(getOptions(args));
      if (!connection.ok) {
        logger?.error?.(connection.error);
        setExitCode(EXIT_INVALID_INPUT);
        return;
      }
      setExitCode(await runClearCache(connection.connection, deps));
    }
  );

  program
    .command("settings")
    .description("List the WAF settings that can be changed and their values")
    .action(() => {
      logger?.info?.(formatSettingsHelp());
    });

  program
    .command("sites")
    .description("List the sites stored in the config file")
    .option("--config <path>", "Config file path")
    .action((...args: unknown[]) => {
      const config = readString(getOptions(args).config);
      setExitCode(runListSites(config ? { config } : {}, deps));
    });

  program
    .command("init")
    .description("Create or update the config file with an API key and site secrets")
    .option("--config <path>", "Config file path")
    .option("--yes", "Write the config without asking for confirmation")
    .action(async (...args: unknown[]) => {
      const opts = getOptions(args);
      if (!process.stdin.isTTY || !process.stdout.isTTY) {
        logger?.error?.("init requires an interactive TTY.");
        setExitCode(EXIT_INVALID_INPUT);
        return;
      }
      const wizardOptions: InitWizardOptions = { autoWrite: opts.yes === true };
      const config = readString(opts.config);
      if (config) {
        wizardOptions.configPath = config;
      }
      if (logger) {
        wizardOptions.logger = logger;
      }
      if (options.cwd) {
        wizardOptions.cwd = options.cwd;
      }
      try {
        const result = await runInitWizard(wizardOptions);
        result.warnings.forEach((warning) => logger?.warn?.(warning));
        if (result.site) {
          logger?.info?.(`Site ${result.site} saved.`);
        }
        setExitCode(EXIT_OK);
      } catch (err) {
        if (err instanceof WizardCancelledError) {
          logger?.info?.("Setup cancelled.");
          return;
        }
        if (err instanceof ConfigError) {
          logger?.error?.(err.message);
          setExitCode(EXIT_INVALID_INPUT);
          return;
        }
        throw err;
      }
    });
}

function setExitCode(code: ExitCode): void {
  process.exitCode = code;
}

type ConnectionRead = { ok: true; connection: ConnectionOptions } | { ok: false; error: string };

function readConnectionOptions(opts: Record<string, unknown>): ConnectionRead {
  const connection: ConnectionOptions = {};
  const key = readString(opts.key);
  if (key) {
    connection.key = key;
  }
  const secret = readString(opts.secret);
  if (secret) {
    connection.secret = secret;
  }
  const site = readString(opts.site);
  if (site) {
    connection.site = site;
  }
  const config = readString(opts.config);
  if (config) {
    connection.config = config;
  }
  const apiUrl = readString(opts.apiUrl);
  if (apiUrl) {
    connection.apiUrl = apiUrl;
  }
  const timeout = parseCount(opts.timeout, { allowZero: false });
  if (timeout === null) {
    return { ok: false, error: "--timeout takes a whole number of milliseconds, at least 1." };
  }
  if (typeof timeout === "number") {
    connection.timeoutMs = timeout;
  }
  return { ok: true, connection };
}

function getOptions(args: unknown[]): Record<string, unknown> {
  const last = args[args.length - 1];
  if (last instanceof Command) {
    return last.opts();
  }
  return isRecord(last) ? last : {};
}

function readString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readStringList(value: unknown): string[] {
  if (typeof value === "string") {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((entry): entry is string => typeof entry === "string");
  }
  return [];
}

// undefined when absent, null when present but not a usable count.
function parseCount(value: unknown, options: { allowZero: boolean }): number | null | undefined {
  if (typeof value === "undefined") {
    return undefined;
  }
  if (typeof value !== "string" || !/^\d+$/.test(value.trim())) {
    return null;
  }
  const parsed = Number.parseInt(value.trim(), 10);
  if (!options.allowZero && parsed === 0) {
    return null;
  }
  return parsed;
}
