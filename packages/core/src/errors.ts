import type { PortRange } from "@devports/shared";

export class DevportsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DevportsError";
  }
}

/**
 * A uniqueness constraint was violated while creating an allocation,
 * usually because another process booked the same port or service first.
 */
export class ConflictError extends DevportsError {
  constructor(
    readonly field: "port" | "service",
    readonly contextHash: string,
    readonly service: string,
    readonly port: number
  ) {
    super(
      field === "port"
        ? `Port ${port} is already allocated`
        : `Service '${service}' already has an allocation in context ${contextHash}`
    );
    this.name = "ConflictError";
  }
}

export class AllocationExhaustedError extends DevportsError {
  constructor(
    readonly service: string,
    readonly rangesTried: PortRange[]
  ) {
    const tried = rangesTried.map((r) => `${r.start}-${r.end}`).join(", ");
    super(`No available port for service '${service}' (tried range ${tried})`);
    this.name = "AllocationExhaustedError";
  }
}

export class InvalidRangeError extends DevportsError {
  constructor(
    readonly service: string,
    readonly start: number,
    readonly end: number,
    reason = "start must be less than end"
  ) {
    super(`Invalid port range for '${service}': ${start}-${end} (${reason})`);
    this.name = "InvalidRangeError";
  }
}

export class SettingsError extends DevportsError {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
  }
}
