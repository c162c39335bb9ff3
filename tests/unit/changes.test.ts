import { describe, expect, it } from "vitest";
import { planChanges, resolveValue } from "../../packages/core/src/changes.js";
import { describeChange, emptyChangeSet, type ChangeSet } from "../../packages/core/src/types.js";

function changeSet(partial: Partial<ChangeSet>): ChangeSet {
  return { ...emptyChangeSet(), ...partial };
}

describe("value precedence", () => {
  it("takes the first non-empty value", () => {
    expect(resolveValue("flag", "template", "config")).toBe("flag");
    expect(resolveValue(undefined, "  ", "config")).toBe("config");
    expect(resolveValue(" padded ", "template")).toBe("padded");
    expect(resolveValue(undefined, undefined)).toBeUndefined();
  });
});

describe("change planning", () => {
  it("unions IP lists and drops duplicates, flags first", () => {
    const plan = planChanges([
      { origin: "flag", changes: changeSet({ whitelistIPs: ["1.2.3.4", "1.2.3.4"] }) },
      { origin: "template", changes: changeSet({ whitelistIPs: ["1.2.3.4", "5.6.7.8"] }) }
    ]);
    expect(plan.errors).toEqual([]);
    expect(plan.changes).toEqual([
      { kind: "ip", list: "whitelist", ip: "1.2.3.4", remove: false, origin: "flag" },
      { kind: "ip", list: "whitelist", ip: "5.6.7.8", remove: false, origin: "template" }
    ]);
  });

  it("expands subnets without repeating individually listed hosts", () => {
    const plan = planChanges([
      { origin: "flag", changes: changeSet({ whitelistIPs: ["10.0.0.1"], whitelistSubnets: ["10.0.0.0/30"] }) }
    ]);
    expect(plan.changes).toEqual([
      { kind: "ip", list: "whitelist", ip: "10.0.0.1", remove: false, origin: "flag" },
      { kind: "ip", list: "whitelist", ip: "10.0.0.2", remove: false, origin: "flag", subnet: "10.0.0.0/30" }
    ]);
  });

  it("warns about unaligned subnets and uses the network address", () => {
    const plan = planChanges([{ origin: "flag", changes: changeSet({ blacklistSubnets: ["10.0.0.5/30"] }) }]);
    expect(plan.warnings).toEqual(["Subnet 10.0.0.5/30 is not aligned; using 10.0.0.4/30."]);
    expect(plan.changes.map((change) => (change.kind === "ip" ? change.subnet : undefined))).toEqual([
      "10.0.0.4/30",
      "10.0.0.4/30"
    ]);
  });

  it("lets flag paths and settings override the template", () => {
    const plan = planChanges([
      {
        origin: "flag",
        changes: changeSet({ whitelistPaths: { "/wp-admin": "equals" }, settings: { securitylevel: "paranoid" } })
      },
      {
        origin: "template",
        changes: changeSet({
          whitelistPaths: { "/wp-admin": "begins_with", "/api": "matches" },
          settings: { securitylevel: "high", adminaccess: "restricted" }
        })
      }
    ]);
    expect(plan.warnings).toEqual([]);
    expect(plan.changes).toEqual([
      { kind: "path", list: "whitelist", path: "/wp-admin", pattern: "equals", remove: false, origin: "flag" },
      { kind: "path", list: "whitelist", path: "/api", pattern: "matches", remove: false, origin: "template" },
      { kind: "setting", name: "securitylevel", value: "paranoid", origin: "flag" },
      { kind: "setting", name: "adminaccess", value: "restricted", origin: "template" }
    ]);
  });

  it("collects invalid addresses as errors", () => {
    const plan = planChanges([
      { origin: "flag", changes: changeSet({ whitelistIPs: ["300.1.1.1", "10.0.0.0/24"] }) },
      { origin: "template", changes: changeSet({ blacklistSubnets: ["10.0.0.0/24"] }) }
    ], { maxHosts: 100 });
    expect(plan.errors).toEqual([
      'Invalid IP address "300.1.1.1" in whitelist (flag).',
      '"10.0.0.0/24" is a subnet; pass it as a whitelist subnet instead of a single IP.',
      "Subnet 10.0.0.0/24 expands to 254 hosts, more than the limit of 100 (raise it with --max-hosts)."
    ]);
    expect(plan.changes).toEqual([]);
  });

  it("applies removal to entries but not to settings", () => {
    const plan = planChanges(
      [
        {
          origin: "flag",
          changes: changeSet({
            blacklistIPs: ["9.9.9.9"],
            blacklistPaths: { "/xmlrpc.php": "equals" },
            settings: { securitylevel: "high" }
          })
        }
      ],
      { remove: true }
    );
    expect(plan.changes.map(describeChange)).toEqual([
      "remove from blacklist IP 9.9.9.9",
      "remove from blacklist path /xmlrpc.php (equals)",
      "set securitylevel=high"
    ]);
    expect(plan.warnings).toEqual([
      "Settings cannot be removed; --delete only applies to whitelist and blacklist entries. Settings are still applied."
    ]);
  });

  it("warns when an IP is on both lists and about unknown settings", () => {
    const plan = planChanges([
      {
        origin: "template",
        changes: changeSet({ whitelistIPs: ["1.1.1.1"], blacklistIPs: ["1.1.1.1"], settings: { turbo: "on" } })
      }
    ]);
    expect(plan.warnings).toEqual([
      "IP 1.1.1.1 is both whitelisted and blacklisted.",
      'Unknown setting "turbo"; sending it as-is. Run `wafctl settings` for the known settings.'
    ]);
    expect(plan.changes.map((change) => change.kind)).toEqual(["ip", "ip", "setting"]);
  });

  it("orders whitelist IPs, blacklist IPs, paths, then settings", () => {
    const plan = planChanges([
      {
        origin: "flag",
        changes: changeSet({
          settings: { adminaccess: "open" },
          blacklistPaths: { "/b": "begins_with" },
          whitelistPaths: { "/a": "begins_with" },
          blacklistIPs: ["2.2.2.2"],
          whitelistIPs: ["1.1.1.1"]
        })
      }
    ]);
    expect(plan.changes.map(describeChange)).toEqual([
      "whitelist IP 1.1.1.1",
      "blacklist IP 2.2.2.2",
      "whitelist path /a (begins_with)",
      "blacklist path /b (begins_with)",
      "set adminaccess=open"
    ]);
  });

  it("compares IPv6 addresses in their canonical form", () => {
    const plan = planChanges([
      {
        origin: "flag",
        changes: changeSet({ whitelistIPs: ["2001:db8::1", "2001:DB8:0::1"], blacklistIPs: ["2001:db8:0:0::1"] })
      }
    ]);

    expect(plan.errors).toEqual([]);
    expect(plan.changes.map(describeChange)).toEqual(["whitelist IP 2001:db8::1", "blacklist IP 2001:db8::1"]);
    expect(plan.warnings).toEqual(["IP 2001:db8::1 is both whitelisted and blacklisted."]);
  });

  it("refuses setting names that collide with the request fields", () => {
    const plan = planChanges([
      { origin: "template", changes: changeSet({ settings: { k: "other", securitylevel: "high" } }) }
    ]);

    expect(plan.errors).toEqual(['Setting name "k" is reserved for the API credentials and action (template).']);
    expect(plan.changes.map(describeChange)).toEqual(["set securitylevel=high"]);
  });
});
