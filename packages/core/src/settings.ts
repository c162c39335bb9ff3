import type { SettingDefinition } from "./types.js";

const TOGGLE = ["enabled", "disabled"];

// Settings accepted by the update_setting action. Advisory: unknown names are
// still sent, the API has the final word.
const SETTINGS: SettingDefinition[] = [
  {
    name: "securitylevel",
    description: "Firewall security level.",
    values: ["high", "paranoid"]
  },
  {
    name: "adminaccess",
    description: "Access to admin panels: open to everyone or restricted to whitelisted IPs.",
    values: ["open", "restricted"]
  },
  {
    name: "commentaccess",
    description: "Access to comment forms: open to everyone or restricted to whitelisted IPs.",
    values: ["open", "restricted"]
  },
  {
    name: "force_sec_headers",
    description: "Add security headers (HSTS variants include subdomains and preload).",
    values: ["enabled", "disabled", "enabledhsts", "enabledhstsfull"]
  },
  { name: "unfilter_html", description: "Allow unfiltered HTML in POST requests.", values: TOGGLE },
  { name: "block_php_upload", description: "Block uploads of PHP files.", values: TOGGLE },
  { name: "detect_adv_xss", description: "Advanced XSS detection.", values: TOGGLE },
  { name: "aggressive_bot_filter", description: "Challenge suspicious bots more aggressively.", values: TOGGLE },
  { name: "http_flood_protection", description: "JavaScript challenge during HTTP floods.", values: TOGGLE },
  { name: "compression_mode", description: "Compress responses at the edge.", values: TOGGLE },
  {
    name: "cache_mode",
    description: "Caching level at the edge.",
    values: ["docache", "sitecache", "nocache", "nocacheatall"]
  },
  { name: "internalip", description: "Origin server IP address the firewall forwards traffic to." },
  { name: "domain_alias", description: "Additional domain served through the firewall." },
  { name: "max_upload_size", description: "Maximum upload size in megabytes." }
];

export function listSettingDefinitions(): SettingDefinition[] {
  return SETTINGS.map((setting) => ({ ...setting }));
}

export function getSettingDefinition(name: string): SettingDefinition | undefined {
  const normalized = name.trim().toLowerCase();
  return SETTINGS.find((setting) => setting.name === normalized);
}

// Returns a warning for unknown names or unexpected values, null when the setting looks right.
export function checkSetting(name: string, value: string): string | null {
  const definition = getSettingDefinition(name);
  if (!definition) {
    return `Unknown setting "${name}"; sending it as-is. Run \`wafctl settings\` for the known settings.`;
  }
  if (definition.values && !definition.values.includes(value)) {
    return `Setting "${name}" expects one of ${definition.values.join(", ")}; got "${value}".`;
  }
  return null;
}

export function formatSettingsHelp(): string {
  const width = Math.max(...SETTINGS.map((setting) => setting.name.length));
  const lines = [
    "Settings can be changed with --setting <name>=<value> or the \"settings\" block of a template.",
    "Settings cannot be removed; --delete only applies to whitelist and blacklist entries.",
    ""
  ];
  for (const setting of SETTINGS) {
    lines.push(`  ${setting.name.padEnd(width)}  ${setting.description}`);
    const values = setting.values ? setting.values.join(" | ") : "free-form";
    lines.push(`  ${"".padEnd(width)}  values: ${values}`);
  }
  return lines.join("\n");
}
