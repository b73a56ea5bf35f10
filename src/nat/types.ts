import type { Protocol } from "../definitions/types.js";

/** A destination-NAT rule forwarding a host port to a container address. */
export interface DnatRule {
  protocol: Protocol;
  /** Host-side port. */
  hostPort: number;
  destinationIp: string;
  destinationPort: number;
  comment: string;
}

/** Opaque reference to an installed rule, as understood by the rule table that returned it. */
export interface RuleHandle {
  chain: string;
  lineNumber: number;
}

/**
 * The host's NAT table. Matching rules by port is the table's concern so
 * the heuristic can change without touching the lifecycle code.
 */
export interface NatRuleTable {
  /** Rules whose destination-port annotation equals `hostPort`, ascending by line number. */
  listMatchingRules(hostPort: number): Promise<RuleHandle[]>;
  deleteRule(handle: RuleHandle): Promise<void>;
  appendRule(rule: DnatRule): Promise<void>;
}
