import { createServer } from "node:net";
import { runCommand } from "../utils/exec.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/**
 * Live view of the host's sockets, consulted read-only by the allocator
 */
export interface PortProbe {
  /** TCP ports currently in LISTEN state; empty when the host cannot be scanned */
  listeningPorts(): Promise<Set<number>>;
  /** Whether a TCP server could bind the port right now */
  isBindable(port: number): Promise<boolean>;
}

export interface HostPortProbeOptions {
  /** Timeout for each scanning command in milliseconds (default: 5 seconds) */
  timeoutMs?: number;
  /** Address used for bind checks (default: 127.0.0.1) */
  host?: string;
  logger?: Logger;
}

const PORT_PATTERN = /:(\d+)\s/;

function extractPort(line: string): number | undefined {
  const match = PORT_PATTERN.exec(line);
  if (!match) {
    return undefined;
  }
  const port = Number(match[1]);
  return port > 0 && port <= 65535 ? port : undefined;
}

function collectPorts(lines: string[]): Set<number> {
  const ports = new Set<number>();
  for (const line of lines) {
    const port = extractPort(line);
    if (port !== undefined) {
      ports.add(port);
    }
  }
  return ports;
}

/**
 * Parse `ss -tlnH` output, e.g. `LISTEN 0 128 127.0.0.1:5432 0.0.0.0:*`
 */
export function parseSsOutput(output: string): Set<number> {
  return collectPorts(output.split("\n"));
}

/**
 * Parse `lsof -iTCP -sTCP:LISTEN -P -n` output; the first line is a header
 */
export function parseLsofOutput(output: string): Set<number> {
  return collectPorts(output.split("\n").slice(1));
}

/**
 * Parse `netstat -tln` output, keeping only LISTEN lines
 */
export function parseNetstatOutput(output: string): Set<number> {
  return collectPorts(output.split("\n").filter((line) => line.includes("LISTEN")));
}

interface Scanner {
  command: string;
  args: string[];
  parse: (output: string) => Set<number>;
}

const SCANNERS: Scanner[] = [
  { command: "ss", args: ["-tlnH"], parse: parseSsOutput },
  { command: "lsof", args: ["-iTCP", "-sTCP:LISTEN", "-P", "-n"], parse: parseLsofOutput },
  { command: "netstat", args: ["-tln"], parse: parseNetstatOutput },
];

/**
 * Probe backed by the host's socket tools (ss, then lsof, then netstat) and
 * test binds.
 */
export class HostPortProbe implements PortProbe {
  private readonly timeoutMs: number;
  private readonly host: string;
  private readonly logger: Logger;

  constructor(options: HostPortProbeOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.host = options.host ?? "127.0.0.1";
    this.logger = options.logger ?? silentLogger();
  }

  async listeningPorts(): Promise<Set<number>> {
    let scanned = false;

    for (const scanner of SCANNERS) {
      const result = await runCommand(scanner.command, scanner.args, { timeoutMs: this.timeoutMs });

      if (!result.ok) {
        this.logger.debug({ command: scanner.command, error: result.error }, "Port scan failed");
        continue;
      }

      scanned = true;
      const ports = scanner.parse(result.stdout);
      if (ports.size > 0) {
        this.logger.debug({ command: scanner.command, count: ports.size }, "Listening ports scanned");
        return ports;
      }
    }

    if (!scanned) {
      this.logger.warn({ probe: "degraded" }, "No port scanner available, using registry data only");
    }
    return new Set();
  }

  isBindable(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const server = createServer();
      server.once("error", () => resolve(false));
      server.listen({ port, host: this.host, exclusive: true }, () => {
        server.close(() => resolve(true));
      });
    });
  }
}
