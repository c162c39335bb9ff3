import { DEFAULT_PATH_PATTERN, PATH_PATTERNS, emptyChangeSet, isPathPattern, type ChangeSet, type PathPattern } from "@wafctl/core";

export type ChangeFlags = {
  whitelistIp?: string;
  blacklistIp?: string;
  whitelistSubnet?: string;
  blacklistSubnet?: string;
  whitelistPath?: string[];
  blacklistPath?: string[];
  setting?: string[];
};

// "200.0.0.1,200.0.0.10" -> ["200.0.0.1", "200.0.0.10"]
export function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

// "/wp-admin:equals" -> ["/wp-admin", "equals"]. A word suffix that is not a known
// pattern is an error; any other suffix ("/a:1") stays part of the path.
export function parsePathFlag(
  value: string
): { path: string; pattern: PathPattern } | { error: string } {
  const trimmed = value.trim();
  const separator = trimmed.lastIndexOf(":");
  if (separator > 0) {
    const suffix = trimmed.slice(separator + 1).toLowerCase();
    if (isPathPattern(suffix)) {
      return { path: trimmed.slice(0, separator), pattern: suffix };
    }
    if (/^[a-z_]+$/.test(suffix)) {
      return {
        error: `Invalid path pattern "${suffix}" in "${trimmed}"; expected one of ${PATH_PATTERNS.join(", ")}.`
      };
    }
  }
  return { path: trimmed, pattern: DEFAULT_PATH_PATTERN };
}

export function parseSettingFlag(value: string): { name: string; value: string } | null {
  const separator = value.indexOf("=");
  if (separator <= 0) {
    return null;
  }
  const name = value.slice(0, separator).trim();
  if (!name) {
    return null;
  }
  return { name, value: value.slice(separator + 1).trim() };
}

export function buildFlagChangeSet(flags: ChangeFlags): { changes: ChangeSet; errors: string[] } {
  const changes = emptyChangeSet();
  const errors: string[] = [];

  changes.whitelistIPs = splitList(flags.whitelistIp);
  changes.blacklistIPs = splitList(flags.blacklistIp);
  changes.whitelistSubnets = splitList(flags.whitelistSubnet);
  changes.blacklistSubnets = splitList(flags.blacklistSubnet);

  for (const raw of flags.whitelistPath ?? []) {
    const parsed = parsePathFlag(raw);
    if ("error" in parsed) {
      errors.push(parsed.error);
      continue;
    }
    changes.whitelistPaths[parsed.path] = parsed.pattern;
  }
  for (const raw of flags.blacklistPath ?? []) {
    const parsed = parsePathFlag(raw);
    if ("error" in parsed) {
      errors.push(parsed.error);
      continue;
    }
    changes.blacklistPaths[parsed.path] = parsed.pattern;
  }
  for (const raw of flags.setting ?? []) {
    const parsed = parseSettingFlag(raw);
    if (!parsed) {
      errors.push(`Invalid --setting "${raw}"; expected <name>=<value>.`);
      continue;
    }
    changes.settings[parsed.name] = parsed.value;
  }

  return { changes, errors };
}
