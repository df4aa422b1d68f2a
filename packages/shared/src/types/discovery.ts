/**
 * A compose service that needs a host port
 */
export interface DiscoveredService {
  name: string;
  containerPort: number;
  envVar?: string;
  image?: string;
  /** Compose file the service was read from */
  source: string;
}

export type ExportFormat = "shell" | "json" | "env";

export const EXPORT_FORMATS: readonly ExportFormat[] = ["shell", "json", "env"];
