import {
  cancel,
  confirm as clackConfirm,
  intro as clackIntro,
  isCancel,
  outro as clackOutro,
  password as clackPassword,
  text as clackText
} from "@clack/prompts";
import { loadSiteConfig, resolveConfigPath, writeSiteConfig, type SiteConfig } from "./config.js";
import type { CliLogger } from "./types.js";

export type InitPrompt = {
  ask: (prompt: string, fallback?: string) => Promise<string>;
  secret: (prompt: string) => Promise<string>;
  confirm: (prompt: string, fallback: boolean) => Promise<boolean>;
  intro?: (title: string) => Promise<void>;
  outro?: (message: string) => Promise<void>;
};

export type InitWizardOptions = {
  configPath?: string;
  /** Write without the final confirmation. */
  autoWrite?: boolean;
  logger?: CliLogger;
  prompt?: InitPrompt;
  cwd?: string;
};

export type InitWizardResult = {
  configPath: string;
  config: SiteConfig;
  site?: string;
  wroteConfig: boolean;
  warnings: string[];
};

// Guided creation of the site config: API key plus one secret per site.
export async function runInitWizard(options: InitWizardOptions = {}): Promise<InitWizardResult> {
  const prompt = options.prompt ?? createPrompt();
  const logger = options.logger;
  const configPath = resolveConfigPath(options.configPath, options.cwd);
  const loaded = loadSiteConfig(configPath);
  const warnings = [...loaded.warnings];
  const config: SiteConfig = { ...loaded.config, sites: { ...loaded.config.sites } };

  await prompt.intro?.("wafctl setup");
  if (loaded.existed) {
    logger?.info?.(`Updating existing config at ${configPath}.`);
  }

  const keepKey = config.apiKey ? await prompt.confirm("Keep the configured API key?", true) : false;
  if (!keepKey) {
    const apiKey = (await prompt.secret("Sucuri API key")).trim();
    if (apiKey) {
      config.apiKey = apiKey;
    } else {
      warnings.push("No API key entered; pass --key when running commands.");
    }
  }

  const site = (await prompt.ask("Site name (for example example.com)")).trim();
  let addedSite: string | undefined;
  if (!site) {
    warnings.push("No site entered; pass --secret when running commands.");
  } else {
    const replace = config.sites[site]
      ? await prompt.confirm(`Site ${site} already has a secret. Replace it?`, false)
      : true;
    if (replace) {
      const secret = (await prompt.secret(`API secret for ${site}`)).trim();
      if (secret) {
        config.sites[site] = secret;
        addedSite = site;
      } else {
        warnings.push(`No API secret entered for ${site}; site not saved.`);
      }
    }
  }

  const shouldWrite = options.autoWrite === true || (await prompt.confirm(`Write config to ${configPath}?`, true));
  if (shouldWrite) {
    writeSiteConfig(configPath, config);
  }
  await prompt.outro?.(shouldWrite ? `Config written to ${configPath}.` : "Config not written.");

  const result: InitWizardResult = { configPath, config, wroteConfig: shouldWrite, warnings };
  if (addedSite) {
    result.site = addedSite;
  }
  return result;
}

export class WizardCancelledError extends Error {
  constructor(message = "wizard cancelled") {
    super(message);
    this.name = "WizardCancelledError";
  }
}

function createPrompt(): InitPrompt {
  const guardCancel = <T>(value: T | symbol): T => {
    if (isCancel(value)) {
      cancel("Setup cancelled.");
      throw new WizardCancelledError();
    }
    return value;
  };

  const ask = async (question: string, fallback?: string): Promise<string> => {
    const textParams: Parameters<typeof clackText>[0] = { message: question };
    if (fallback) {
      textParams.initialValue = fallback;
    }
    const answer = guardCancel(await clackText(textParams));
    const trimmed = String(answer ?? "").trim();
    return trimmed.length > 0 ? trimmed : fallback ?? "";
  };

  const secret = async (question: string): Promise<string> => {
    const answer = guardCancel(await clackPassword({ message: question, mask: "*" }));
    return String(answer ?? "").trim();
  };

  const confirm = async (question: string, fallback: boolean): Promise<boolean> => {
    const value = guardCancel(await clackConfirm({ message: question, initialValue: fallback }));
    return Boolean(value);
  };

  const intro = async (title: string): Promise<void> => {
    clackIntro(title);
  };

  const outro = async (message: string): Promise<void> => {
    clackOutro(message);
  };

  return { ask, secret, confirm, intro, outro };
}
