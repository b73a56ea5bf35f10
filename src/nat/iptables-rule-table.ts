import { ChildProcessRunner, type CommandRunner } from "../runtime/command-runner.js";
import type { DnatRule, NatRuleTable, RuleHandle } from "./types.js";

const CHAIN = "PREROUTING";

export interface IptablesRuleTableOptions {
  runner?: CommandRunner;
  /** Prefix every call with `sudo -S`. */
  useSudo?: boolean;
  /** Host ingress interface (`-i`); rules match every interface when unset. */
  ingressInterface?: string;
}

/**
 * Parse `iptables -L <chain> -n --line-numbers` output into the line
 * numbers of rules annotated with exactly `dpt:<port>`.
 */
export function parseMatchingLines(listing: string, hostPort: number): number[] {
  const dpt = new RegExp(`\\bdpt:${hostPort}(?!\\d)`);
  const lines: number[] = [];
  for (const line of listing.split("\n")) {
    const lineNumber = Number.parseInt(line.trim().split(/\s+/)[0] ?? "", 10);
    if (Number.isNaN(lineNumber)) continue;
    if (dpt.test(line)) lines.push(lineNumber);
  }
  return lines.sort((a, b) => a - b);
}

/** The `nat` table's PREROUTING chain, driven through the iptables binary. */
export class IptablesRuleTable implements NatRuleTable {
  private readonly runner: CommandRunner;
  private readonly useSudo: boolean;
  private readonly ingressInterface: string | undefined;

  constructor(options: IptablesRuleTableOptions = {}) {
    this.runner = options.runner ?? new ChildProcessRunner();
    this.useSudo = options.useSudo ?? true;
    this.ingressInterface = options.ingressInterface;
  }

  async listMatchingRules(hostPort: number): Promise<RuleHandle[]> {
    const listing = await this.iptables(["-t", "nat", "-L", CHAIN, "-n", "--line-numbers"]);
    return parseMatchingLines(listing, hostPort).map((lineNumber) => ({ chain: CHAIN, lineNumber }));
  }

  async deleteRule(handle: RuleHandle): Promise<void> {
    await this.iptables(["-t", "nat", "-D", handle.chain, String(handle.lineNumber)]);
  }

  async appendRule(rule: DnatRule): Promise<void> {
    const args = ["-t", "nat", "-A", CHAIN, "-p", rule.protocol];
    if (this.ingressInterface) args.push("-i", this.ingressInterface);
    args.push(
      "--dport",
      String(rule.hostPort),
      "-j",
      "DNAT",
      "--to-destination",
      `${rule.destinationIp}:${rule.destinationPort}`,
      "-m",
      "comment",
      "--comment",
      rule.comment,
    );
    await this.iptables(args);
  }

  private iptables(args: string[]): Promise<string> {
    return this.useSudo
      ? this.runner.capture("sudo", ["-S", "iptables", ...args])
      : this.runner.capture("iptables", args);
  }
}
