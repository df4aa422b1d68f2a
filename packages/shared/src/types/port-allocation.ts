/**
 * Inclusive window of ports scanned for a service
 */
export interface PortRange {
  service: string;
  start: number;
  end: number;
}

/**
 * A port claimed by a service inside a context
 */
export interface Allocation {
  readonly id: number;
  readonly contextHash: string;
  /** Absolute path of the project the context was derived from */
  readonly contextPath: string;
  readonly contextLabel: string;
  readonly service: string;
  readonly port: number;
  /** Port the service listens on inside its container */
  readonly containerPort?: number;
  /** Environment variable the port is exported as */
  readonly envVar?: string;
  /** Where the allocation came from: "manual" or a compose file path */
  readonly source?: string;
  readonly createdAt: string;
  readonly lastAccessedAt: string;
}

/**
 * Input for creating an allocation
 */
export interface CreateAllocationInput {
  contextHash: string;
  contextPath: string;
  contextLabel: string;
  service: string;
  port: number;
  containerPort?: number;
  envVar?: string;
  source?: string;
}

/**
 * Outcome of a prune pass
 */
export interface PruneResult {
  removed: Allocation[];
  kept: Allocation[];
  errors: string[];
}
