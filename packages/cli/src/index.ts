export { registerWafCli, type WafCliOptions } from "./cli.js";
export * from "./config.js";
export * from "./template.js";
export * from "./flags.js";
export * from "./run.js";
export { runInitWizard, WizardCancelledError } from "./wizard.js";
export type { InitPrompt, InitWizardOptions, InitWizardResult } from "./wizard.js";
export * from "./types.js";
