import { describe, expect, it } from "vitest";
import { checkSetting, formatSettingsHelp, getSettingDefinition } from "../../packages/core/src/settings.js";

describe("settings catalog", () => {
  it("looks settings up case-insensitively", () => {
    expect(getSettingDefinition("SecurityLevel")?.values).toEqual(["high", "paranoid"]);
    expect(getSettingDefinition("nope")).toBeUndefined();
  });

  it("checks values against the known set", () => {
    expect(checkSetting("securitylevel", "high")).toBeNull();
    expect(checkSetting("securitylevel", "low")).toBe('Setting "securitylevel" expects one of high, paranoid; got "low".');
    expect(checkSetting("internalip", "203.0.113.10")).toBeNull();
  });

  it("renders help with values for each setting", () => {
    const lines = formatSettingsHelp().split("\n");
    expect(lines[0]).toBe(
      'Settings can be changed with --setting <name>=<value> or the "settings" block of a template.'
    );
    expect(lines).toContain(`${" ".repeat(25)}values: high | paranoid`);
    expect(lines).toContain(`  internalip${" ".repeat(11)}  Origin server IP address the firewall forwards traffic to.`);
  });
});
