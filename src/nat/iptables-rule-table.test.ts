import { describe, expect, it } from "vitest";
import { FakeCommandRunner } from "../test/fakes.js";
import { IptablesRuleTable, parseMatchingLines } from "./iptables-rule-table.js";

const LISTING = `Chain PREROUTING (policy ACCEPT)
num  target     prot opt source               destination
1    DNAT       tcp  --  0.0.0.0/0            0.0.0.0/0            tcp dpt:8080 /* Web */ to:10.0.0.3:80
2    DNAT       tcp  --  0.0.0.0/0            0.0.0.0/0            tcp dpt:80 /* Proxy */ to:10.0.0.4:80
3    DNAT       udp  --  0.0.0.0/0            0.0.0.0/0            udp dpt:8080 /* Web */ to:10.0.0.3:80
4    DOCKER     all  --  0.0.0.0/0            0.0.0.0/0            ADDRTYPE match dst-type LOCAL
`;

describe("parseMatchingLines", () => {
  it("finds every rule on the port", () => {
    expect(parseMatchingLines(LISTING, 8080)).toEqual([1, 3]);
  });

  it("does not match a port that is a prefix of another", () => {
    expect(parseMatchingLines(LISTING, 80)).toEqual([2]);
    expect(parseMatchingLines(LISTING, 808)).toEqual([]);
  });

  it("ignores the chain header lines", () => {
    expect(parseMatchingLines("Chain PREROUTING (policy ACCEPT)\nnum  target\n", 80)).toEqual([]);
  });
});

describe("IptablesRuleTable", () => {
  it("lists PREROUTING with line numbers through sudo", async () => {
    const runner = new FakeCommandRunner().queueOutput(LISTING);
    const table = new IptablesRuleTable({ runner });

    expect(await table.listMatchingRules(8080)).toEqual([
      { chain: "PREROUTING", lineNumber: 1 },
      { chain: "PREROUTING", lineNumber: 3 },
    ]);
    expect(runner.recorded).toEqual([
      { file: "sudo", args: ["-S", "iptables", "-t", "nat", "-L", "PREROUTING", "-n", "--line-numbers"] },
    ]);
  });

  it("deletes a rule by line number", async () => {
    const runner = new FakeCommandRunner();
    const table = new IptablesRuleTable({ runner, useSudo: false });

    await table.deleteRule({ chain: "PREROUTING", lineNumber: 3 });
    expect(runner.recorded).toEqual([{ file: "iptables", args: ["-t", "nat", "-D", "PREROUTING", "3"] }]);
  });

  it("appends a commented DNAT rule", async () => {
    const runner = new FakeCommandRunner();
    const table = new IptablesRuleTable({ runner, useSudo: false });

    await table.appendRule({
      protocol: "udp",
      hostPort: 5353,
      destinationIp: "10.0.0.3",
      destinationPort: 53,
      comment: "dns",
    });
    expect(runner.recorded[0]?.args).toEqual([
      "-t",
      "nat",
      "-A",
      "PREROUTING",
      "-p",
      "udp",
      "--dport",
      "5353",
      "-j",
      "DNAT",
      "--to-destination",
      "10.0.0.3:53",
      "-m",
      "comment",
      "--comment",
      "dns",
    ]);
  });

  it("restricts the rule to the ingress interface when configured", async () => {
    const runner = new FakeCommandRunner();
    const table = new IptablesRuleTable({ runner, useSudo: false, ingressInterface: "enp3s0" });

    await table.appendRule({
      protocol: "tcp",
      hostPort: 8080,
      destinationIp: "10.0.0.3",
      destinationPort: 80,
      comment: "Web",
    });
    expect(runner.recorded[0]?.args.slice(4, 8)).toEqual(["-p", "tcp", "-i", "enp3s0"]);
  });
});
