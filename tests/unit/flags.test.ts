import { describe, expect, it } from "vitest";
import { buildFlagChangeSet, parsePathFlag, parseSettingFlag, splitList } from "../../packages/cli/src/flags.js";

describe("flag parsing", () => {
  it("splits comma separated lists", () => {
    expect(splitList("200.0.0.1, 200.0.0.10,,")).toEqual(["200.0.0.1", "200.0.0.10"]);
    expect(splitList(undefined)).toEqual([]);
  });

  it("reads an optional pattern suffix on paths", () => {
    expect(parsePathFlag("/wp-admin:equals")).toEqual({ path: "/wp-admin", pattern: "equals" });
    expect(parsePathFlag("/login:ENDS_WITH")).toEqual({ path: "/login", pattern: "ends_with" });
    expect(parsePathFlag("/a:1")).toEqual({ path: "/a:1", pattern: "begins_with" });
    expect(parsePathFlag("/wp-admin")).toEqual({ path: "/wp-admin", pattern: "begins_with" });
  });

  it("rejects an unknown pattern suffix", () => {
    expect(parsePathFlag("/admin:contains")).toEqual({
      error: 'Invalid path pattern "contains" in "/admin:contains"; expected one of begins_with, ends_with, equals, matches.'
    });
    const { changes, errors } = buildFlagChangeSet({ blacklistPath: ["/admin:contains", "/login:equals"] });
    expect(errors).toEqual([
      'Invalid path pattern "contains" in "/admin:contains"; expected one of begins_with, ends_with, equals, matches.'
    ]);
    expect(changes.blacklistPaths).toEqual({ "/login": "equals" });
  });

  it("splits settings at the first equals sign", () => {
    expect(parseSettingFlag("domain_alias=a.com=b")).toEqual({ name: "domain_alias", value: "a.com=b" });
    expect(parseSettingFlag("securitylevel= high ")).toEqual({ name: "securitylevel", value: "high" });
    expect(parseSettingFlag("=high")).toBeNull();
    expect(parseSettingFlag("securitylevel")).toBeNull();
  });

  it("builds a change set from flags", () => {
    const { changes, errors } = buildFlagChangeSet({
      whitelistIp: "1.1.1.1,2.2.2.2",
      blacklistSubnet: "10.0.0.0/30",
      whitelistPath: ["/wp-admin:equals"],
      blacklistPath: ["/xmlrpc.php"],
      setting: ["securitylevel=paranoid", "broken"]
    });

    expect(errors).toEqual(['Invalid --setting "broken"; expected <name>=<value>.']);
    expect(changes).toEqual({
      whitelistIPs: ["1.1.1.1", "2.2.2.2"],
      blacklistIPs: [],
      whitelistSubnets: [],
      blacklistSubnets: ["10.0.0.0/30"],
      whitelistPaths: { "/wp-admin": "equals" },
      blacklistPaths: { "/xmlrpc.php": "begins_with" },
      settings: { securitylevel: "paranoid" }
    });
  });
});
