import { DEFAULT_MAX_HOSTS, SubnetError, expandSubnet, isIPAddress, normalizeIPAddress, parseSubnet } from "./cidr.js";
import { checkSetting } from "./settings.js";
import type {
  ChangeOrigin,
  ChangePlan,
  ChangeSet,
  IpChange,
  ListKind,
  PathChange,
  PathPattern,
  SettingChange,
  WafChange
} from "./types.js";

export type ChangeSource = {
  origin: ChangeOrigin;
  changes: ChangeSet;
};

export type PlanOptions = {
  remove?: boolean;
  maxHosts?: number;
};

const LISTS: ListKind[] = ["whitelist", "blacklist"];

// Form fields carrying the API key, secret and action.
export const RESERVED_SETTING_NAMES: readonly string[] = ["k", "s", "a"];

// First non-empty value wins: explicit flag, then template file, then site config file.
export function resolveValue(...candidates: Array<string | undefined>): string | undefined {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
}

/**
 * Turn the desired changes into one change per API request.
 *
 * Sources are given in precedence order: for the same path or setting name the
 * earlier source wins, list entries are unioned and duplicates dropped.
 * Subnets are expanded into their usable hosts.
 */
export function planChanges(sources: ChangeSource[], options: PlanOptions = {}): ChangePlan {
  const remove = options.remove ?? false;
  const maxHosts = options.maxHosts ?? DEFAULT_MAX_HOSTS;
  const warnings: string[] = [];
  const errors: string[] = [];
  const ipChanges: IpChange[] = [];
  const seenIps = new Map<ListKind, Set<string>>(LISTS.map((list) => [list, new Set<string>()]));

  const pushIp = (list: ListKind, ip: string, origin: ChangeOrigin, subnet?: string): void => {
    const seen = seenIps.get(list);
    if (!seen || seen.has(ip)) {
      return;
    }
    seen.add(ip);
    const change: IpChange = { kind: "ip", list, ip, remove, origin };
    if (subnet) {
      change.subnet = subnet;
    }
    ipChanges.push(change);
  };

  for (const list of LISTS) {
    for (const source of sources) {
      for (const raw of ipsOf(source.changes, list)) {
        const ip = raw.trim();
        if (!ip) {
          continue;
        }
        if (!isIPAddress(ip)) {
          errors.push(
            parseSubnet(ip)
              ? `"${ip}" is a subnet; pass it as a ${list} subnet instead of a single IP.`
              : `Invalid IP address "${ip}" in ${list} (${source.origin}).`
          );
          continue;
        }
        pushIp(list, normalizeIPAddress(ip), source.origin);
      }
    }
    for (const source of sources) {
      for (const raw of subnetsOf(source.changes, list)) {
        const cidr = raw.trim();
        if (!cidr) {
          continue;
        }
        try {
          const normalized = parseSubnet(cidr)?.cidr ?? cidr;
          if (normalized !== cidr) {
            warnings.push(`Subnet ${cidr} is not aligned; using ${normalized}.`);
          }
          for (const host of expandSubnet(cidr, { maxHosts })) {
            pushIp(list, host, source.origin, normalized);
          }
        } catch (err) {
          if (err instanceof SubnetError) {
            errors.push(err.message);
            continue;
          }
          throw err;
        }
      }
    }
  }

  const whitelisted = seenIps.get("whitelist") ?? new Set<string>();
  for (const ip of seenIps.get("blacklist") ?? []) {
    if (whitelisted.has(ip)) {
      warnings.push(`IP ${ip} is both whitelisted and blacklisted.`);
    }
  }

  const pathChanges: PathChange[] = [];
  for (const list of LISTS) {
    const patterns = new Map<string, { pattern: PathPattern; origin: ChangeOrigin }>();
    for (const source of sources) {
      for (const [rawPath, pattern] of Object.entries(pathsOf(source.changes, list))) {
        const path = rawPath.trim();
        if (!path) {
          errors.push(`Empty URL path in ${list} (${source.origin}).`);
          continue;
        }
        if (!patterns.has(path)) {
          patterns.set(path, { pattern, origin: source.origin });
        }
      }
    }
    for (const [path, entry] of patterns) {
      pathChanges.push({ kind: "path", list, path, pattern: entry.pattern, remove, origin: entry.origin });
    }
  }

  const settingChanges: SettingChange[] = [];
  const settingNames = new Set<string>();
  for (const source of sources) {
    for (const [rawName, value] of Object.entries(source.changes.settings)) {
      const name = rawName.trim();
      if (!name) {
        errors.push(`Empty setting name (${source.origin}).`);
        continue;
      }
      if (RESERVED_SETTING_NAMES.includes(name)) {
        errors.push(`Setting name "${name}" is reserved for the API credentials and action (${source.origin}).`);
        continue;
      }
      if (settingNames.has(name)) {
        continue;
      }
      settingNames.add(name);
      const warning = checkSetting(name, value);
      if (warning) {
        warnings.push(warning);
      }
      settingChanges.push({ kind: "setting", name, value, origin: source.origin });
    }
  }
  if (remove && settingChanges.length > 0) {
    warnings.push("Settings cannot be removed; --delete only applies to whitelist and blacklist entries. Settings are still applied.");
  }

  const changes: WafChange[] = [...ipChanges, ...pathChanges, ...settingChanges];
  return { changes, warnings, errors };
}

function ipsOf(changes: ChangeSet, list: ListKind): string[] {
  return list === "whitelist" ? changes.whitelistIPs : changes.blacklistIPs;
}

function subnetsOf(changes: ChangeSet, list: ListKind): string[] {
  return list === "whitelist" ? changes.whitelistSubnets : changes.blacklistSubnets;
}

function pathsOf(changes: ChangeSet, list: ListKind): Record<string, PathPattern> {
  return list === "whitelist" ? changes.whitelistPaths : changes.blacklistPaths;
}
