import type { Allocation, Context, ExportFormat } from "@devports/shared";

/**
 * Variable an allocation is exported as: its own env var, or SERVICE_PORT
 */
export function envVarName(allocation: Pick<Allocation, "envVar" | "service">): string {
  if (allocation.envVar) {
    return allocation.envVar;
  }
  return `${allocation.service.toUpperCase().replace(/[^A-Z0-9_]/g, "_")}_PORT`;
}

export function composeProjectName(context: Pick<Context, "label">): string {
  return context.label.replaceAll("/", "-");
}

/**
 * Render allocations as shell exports, dotenv lines or JSON
 */
export function formatExport(
  allocations: Allocation[],
  context: Pick<Context, "label">,
  format: ExportFormat
): string {
  switch (format) {
    case "json": {
      const values: Record<string, number> = {};
      for (const allocation of allocations) {
        values[envVarName(allocation)] = allocation.port;
      }
      return JSON.stringify(values, null, 2);
    }
    case "env":
      return allocations.map((a) => `${envVarName(a)}=${a.port}`).join("\n");
    case "shell": {
      const lines = allocations.map((a) => `export ${envVarName(a)}=${a.port}`);
      // Isolates compose networks and volumes per context
      lines.push(`export COMPOSE_PROJECT_NAME=${composeProjectName(context)}`);
      return lines.join("\n");
    }
  }
}
