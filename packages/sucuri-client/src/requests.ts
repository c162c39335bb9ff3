import { describeChange, type ListKind, type PathPattern, type WafChange } from "@wafctl/core";

export type SucuriAction =
  | "show_settings"
  | "clear_cache"
  | "whitelist_ip"
  | "delete_whitelist_ip"
  | "blacklist_ip"
  | "delete_blacklist_ip"
  | "update_setting";

// One call against the API; credentials are added by the client.
export type SucuriRequest = {
  action: SucuriAction;
  params: Record<string, string>;
  description: string;
};

export function whitelistIp(ip: string, remove = false): SucuriRequest {
  return {
    action: remove ? "delete_whitelist_ip" : "whitelist_ip",
    params: { ip },
    description: `${remove ? "remove from whitelist" : "whitelist"} IP ${ip}`
  };
}

export function blacklistIp(ip: string, remove = false): SucuriRequest {
  return {
    action: remove ? "delete_blacklist_ip" : "blacklist_ip",
    params: { ip },
    description: `${remove ? "remove from blacklist" : "blacklist"} IP ${ip}`
  };
}

const PATH_FIELDS: Record<ListKind, { add: string; remove: string; pattern: string }> = {
  whitelist: { add: "allowlist_dir", remove: "remove_allowlist_dir", pattern: "allowlist_dir_pattern" },
  blacklist: { add: "blocked_dir", remove: "remove_blocked_dir", pattern: "blocked_dir_pattern" }
};

function pathRequest(list: ListKind, path: string, pattern: PathPattern, remove: boolean): SucuriRequest {
  const fields = PATH_FIELDS[list];
  return {
    action: "update_setting",
    params: {
      [remove ? fields.remove : fields.add]: path,
      [fields.pattern]: pattern
    },
    description: `${remove ? `remove from ${list}` : list} path ${path} (${pattern})`
  };
}

export function whitelistPath(path: string, pattern: PathPattern, remove = false): SucuriRequest {
  return pathRequest("whitelist", path, pattern, remove);
}

export function blacklistPath(path: string, pattern: PathPattern, remove = false): SucuriRequest {
  return pathRequest("blacklist", path, pattern, remove);
}

export function updateSetting(name: string, value: string): SucuriRequest {
  return {
    action: "update_setting",
    params: { [name]: value },
    description: `set ${name}=${value}`
  };
}

export function showSettings(): SucuriRequest {
  return { action: "show_settings", params: {}, description: "show settings" };
}

export function clearCache(): SucuriRequest {
  return { action: "clear_cache", params: {}, description: "clear cache" };
}

export function toSucuriRequest(change: WafChange): SucuriRequest {
  switch (change.kind) {
    case "ip": {
      const request = change.list === "whitelist" ? whitelistIp(change.ip, change.remove) : blacklistIp(change.ip, change.remove);
      return { ...request, description: describeChange(change) };
    }
    case "path":
      return pathRequest(change.list, change.path, change.pattern, change.remove);
    case "setting":
      return updateSetting(change.name, change.value);
  }
}
