import type { ActionStep } from "../actions/steps.js";

export type Protocol = "tcp" | "udp";

/** Host port `toPort` forwarded to `fromPort` on the container's `device` address. */
export interface PortMapping {
  device: string;
  protocol: Protocol;
  fromPort: number;
  toPort: number;
  comment: string;
}

/** Host directory `source` mounted at `path` inside the container. */
export interface Mountpoint {
  name: string;
  source: string;
  path: string;
}

/** A definition file after validation, with every optional attribute defaulted. */
export interface ContainerDefinition {
  id: string;
  name: string;
  description: string;
  box: string;
  shell: string;
  user: string;
  requires: string[];
  actions: Record<string, ActionStep[]>;
  ports: PortMapping[];
  mountpoints: Mountpoint[];
  variables: Record<string, string>;
  files: Record<string, string>;
}

export const DEFAULT_SHELL = "/bin/sh";
export const DEFAULT_USER = "root";
