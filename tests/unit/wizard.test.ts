import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { runInitWizard, type InitPrompt } from "../../packages/cli/src/wizard.js";

type Answers = {
  asks?: string[];
  secrets?: string[];
  confirms?: Record<string, boolean>;
};

function scriptedPrompt(answers: Answers): { prompt: InitPrompt; questions: string[] } {
  const asks = [...(answers.asks ?? [])];
  const secrets = [...(answers.secrets ?? [])];
  const questions: string[] = [];
  const prompt: InitPrompt = {
    ask: async (question, fallback) => {
      questions.push(question);
      return asks.shift() ?? fallback ?? "";
    },
    secret: async (question) => {
      questions.push(question);
      return secrets.shift() ?? "";
    },
    confirm: async (question, fallback) => {
      questions.push(question);
      return answers.confirms?.[question] ?? fallback;
    }
  };
  return { prompt, questions };
}

function tempConfigPath(): string {
  return path.join(fs.mkdtempSync(path.join(os.tmpdir(), "wafctl-init-")), "config.json");
}

describe("init wizard", () => {
  it("creates a new config", async () => {
    const configPath = tempConfigPath();
    const { prompt, questions } = scriptedPrompt({
      asks: ["example.com"],
      secrets: ["test-key", "test-secret"]
    });

    const result = await runInitWizard({ configPath, prompt });

    expect(questions).toEqual([
      "Sucuri API key",
      "Site name (for example example.com)",
      "API secret for example.com",
      `Write config to ${configPath}?`
    ]);
    expect(result).toEqual({
      configPath,
      config: { apiKey: "test-key", sites: { "example.com": "test-secret" } },
      site: "example.com",
      wroteConfig: true,
      warnings: []
    });
    expect(JSON.parse(fs.readFileSync(configPath, "utf8"))).toEqual({
      apiKey: "test-key",
      sites: { "example.com": "test-secret" }
    });
  });

  it("keeps an existing site unless asked to replace it", async () => {
    const configPath = tempConfigPath();
    fs.writeFileSync(configPath, JSON.stringify({ apiKey: "test-key", sites: { "example.com": "old-secret" } }));
    const { prompt, questions } = scriptedPrompt({ asks: ["example.com"] });

    const result = await runInitWizard({ configPath, prompt, autoWrite: true });

    expect(questions).toEqual([
      "Keep the configured API key?",
      "Site name (for example example.com)",
      "Site example.com already has a secret. Replace it?"
    ]);
    expect(result.site).toBeUndefined();
    expect(result.wroteConfig).toBe(true);
    expect(result.config).toEqual({ apiKey: "test-key", sites: { "example.com": "old-secret" } });
  });

  it("does not write when declined and reports skipped answers", async () => {
    const configPath = tempConfigPath();
    const { prompt } = scriptedPrompt({
      asks: ["example.com"],
      secrets: ["", ""],
      confirms: { [`Write config to ${configPath}?`]: false }
    });

    const result = await runInitWizard({ configPath, prompt });

    expect(result.wroteConfig).toBe(false);
    expect(result.warnings).toEqual([
      "No API key entered; pass --key when running commands.",
      "No API secret entered for example.com; site not saved."
    ]);
    expect(fs.existsSync(configPath)).toBe(false);
  });
});
