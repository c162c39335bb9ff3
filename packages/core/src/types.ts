export type ListKind = "whitelist" | "blacklist";
export type PathPattern = "begins_with" | "ends_with" | "equals" | "matches";
export type ChangeOrigin = "flag" | "template";

export const PATH_PATTERNS: readonly PathPattern[] = ["begins_with", "ends_with", "equals", "matches"];
export const DEFAULT_PATH_PATTERN: PathPattern = "begins_with";

// Desired changes as written by the user, before subnet expansion.
export type ChangeSet = {
  whitelistIPs: string[];
  blacklistIPs: string[];
  whitelistSubnets: string[];
  blacklistSubnets: string[];
  whitelistPaths: Record<string, PathPattern>;
  blacklistPaths: Record<string, PathPattern>;
  settings: Record<string, string>;
};

export type IpChange = {
  kind: "ip";
  list: ListKind;
  ip: string;
  remove: boolean;
  origin: ChangeOrigin;
  /** Subnet the address was expanded from, when it did not come in as a single IP. */
  subnet?: string;
};

export type PathChange = {
  kind: "path";
  list: ListKind;
  path: string;
  pattern: PathPattern;
  remove: boolean;
  origin: ChangeOrigin;
};

export type SettingChange = {
  kind: "setting";
  name: string;
  value: string;
  origin: ChangeOrigin;
};

// One planned unit of work; maps to exactly one API request.
export type WafChange = IpChange | PathChange | SettingChange;

export type ChangePlan = {
  changes: WafChange[];
  warnings: string[];
  errors: string[];
};

export type SettingDefinition = {
  name: string;
  description: string;
  /** Accepted values; absent for free-form settings. */
  values?: string[];
};

export function emptyChangeSet(): ChangeSet {
  return {
    whitelistIPs: [],
    blacklistIPs: [],
    whitelistSubnets: [],
    blacklistSubnets: [],
    whitelistPaths: {},
    blacklistPaths: {},
    settings: {}
  };
}

export function isPathPattern(value: unknown): value is PathPattern {
  return typeof value === "string" && PATH_PATTERNS.some((pattern) => pattern === value);
}

export function isChangeSetEmpty(changes: ChangeSet): boolean {
  return (
    changes.whitelistIPs.length === 0 &&
    changes.blacklistIPs.length === 0 &&
    changes.whitelistSubnets.length === 0 &&
    changes.blacklistSubnets.length === 0 &&
    Object.keys(changes.whitelistPaths).length === 0 &&
    Object.keys(changes.blacklistPaths).length === 0 &&
    Object.keys(changes.settings).length === 0
  );
}

// Short human label for logs and dry runs. Never includes credentials.
export function describeChange(change: WafChange): string {
  switch (change.kind) {
    case "ip": {
      const verb = change.remove ? `remove from ${change.list}` : change.list;
      return change.subnet ? `${verb} IP ${change.ip} (from ${change.subnet})` : `${verb} IP ${change.ip}`;
    }
    case "path": {
      const verb = change.remove ? `remove from ${change.list}` : change.list;
      return `${verb} path ${change.path} (${change.pattern})`;
    }
    case "setting":
      return `set ${change.name}=${change.value}`;
  }
}
