import type { PortMapping } from "../definitions/types.js";
import type { NatRuleTable } from "./types.js";

/** Anything that can report the live address of one of its network devices. */
export interface AddressSource {
  getIp(device: string): Promise<string>;
}

/**
 * Installs and removes the DNAT rule of one port mapping. Rules are keyed
 * by host port: `delete` removes every rule on that port, so installing
 * is delete-then-create.
 */
export class PortForwarder {
  constructor(private readonly table: NatRuleTable) {}

  async create(target: AddressSource, port: PortMapping): Promise<void> {
    const ip = await target.getIp(port.device);
    await this.table.appendRule({
      protocol: port.protocol,
      hostPort: port.toPort,
      destinationIp: ip,
      destinationPort: port.fromPort,
      comment: port.comment,
    });
  }

  /** Remove every rule for the mapping's host port. Returns how many were removed. */
  async delete(port: PortMapping): Promise<number> {
    const handles = await this.table.listMatchingRules(port.toPort);
    // Highest line number first so earlier deletions don't renumber later ones.
    const ordered = [...handles].sort((a, b) => b.lineNumber - a.lineNumber);
    for (const handle of ordered) {
      await this.table.deleteRule(handle);
    }
    return ordered.length;
  }

  async replace(target: AddressSource, port: PortMapping): Promise<void> {
    await this.delete(port);
    await this.create(target, port);
  }
}
