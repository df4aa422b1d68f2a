import { existsSync, readFileSync } from "node:fs";
import { isAbsolute, join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { DiscoveredService } from "@devports/shared";
import { silentLogger, type Logger } from "../utils/logger.js";

export const COMPOSE_FILE_NAMES = [
  "docker-compose.yml",
  "docker-compose.yaml",
  "compose.yml",
  "compose.yaml",
] as const;

const PortDefinitionSchema = z.union([
  z.string(),
  z.number(),
  z
    .object({
      published: z.union([z.string(), z.number()]).optional(),
      target: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough(),
]);

const ComposeServiceSchema = z
  .object({
    image: z.string().optional(),
    ports: z.array(PortDefinitionSchema).optional(),
  })
  .passthrough();

const ComposeFileSchema = z
  .object({
    services: z.record(z.string(), z.unknown()).optional(),
  })
  .passthrough();

type PortDefinition = z.infer<typeof PortDefinitionSchema>;

type ParsedPort = Pick<DiscoveredService, "containerPort" | "envVar">;

const VARIABLE_PORT = /^\$\{?(\w+)\}?:(\d+)(?:\/\w+)?$/;
const BARE_PORT = /^(\d+)(?:\/\w+)?$/;

/**
 * Turn one compose `ports` entry into an allocation request.
 * Entries that already pin a host port return undefined.
 */
export function parsePortDefinition(definition: PortDefinition, serviceName: string): ParsedPort | undefined {
  if (typeof definition === "object") {
    const { published, target } = definition;
    if (typeof published === "string" && published.startsWith("$")) {
      return {
        containerPort: target !== undefined ? Number(target) || 0 : 0,
        envVar: published.replace(/^\$\{?/, "").replace(/\}$/, ""),
      };
    }
    return undefined;
  }

  const value = String(definition);

  const variable = VARIABLE_PORT.exec(value);
  if (variable) {
    return { containerPort: Number(variable[2]), envVar: variable[1] };
  }

  const bare = BARE_PORT.exec(value);
  if (bare) {
    return { containerPort: Number(bare[1]), envVar: `${serviceName.toUpperCase()}_PORT` };
  }

  return undefined;
}

/**
 * Services in a compose file that need a dynamically allocated host port
 */
export function parseComposeFile(filePath: string, logger: Logger = silentLogger()): DiscoveredService[] {
  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(filePath, "utf-8"));
  } catch (error) {
    logger.warn({ file: filePath, err: error }, "Failed to read compose file");
    return [];
  }

  const file = ComposeFileSchema.safeParse(raw);
  if (!file.success || !file.data.services) {
    return [];
  }

  const services: DiscoveredService[] = [];

  for (const [name, config] of Object.entries(file.data.services)) {
    const service = ComposeServiceSchema.safeParse(config);
    if (!service.success) {
      logger.debug({ file: filePath, service: name }, "Skipping unrecognized service definition");
      continue;
    }

    for (const definition of service.data.ports ?? []) {
      const parsed = parsePortDefinition(definition, name);
      if (parsed) {
        services.push({ name, ...parsed, image: service.data.image, source: filePath });
      }
    }
  }

  return services;
}

export interface DiscoverOptions {
  /** Directory to search (default: current working directory) */
  cwd?: string;
  /** Only read this file, relative to `cwd` unless absolute */
  composeFile?: string;
  logger?: Logger;
}

/**
 * Discover services from the compose files of a project
 */
export function discoverServices(options: DiscoverOptions = {}): DiscoveredService[] {
  const cwd = options.cwd ?? process.cwd();
  const logger = options.logger ?? silentLogger();

  if (options.composeFile) {
    const path = isAbsolute(options.composeFile) ? options.composeFile : join(cwd, options.composeFile);
    return existsSync(path) ? parseComposeFile(path, logger) : [];
  }

  return COMPOSE_FILE_NAMES.map((name) => join(cwd, name))
    .filter((path) => existsSync(path))
    .flatMap((path) => parseComposeFile(path, logger));
}

const SERVICE_TYPES: Array<[keywords: string[], type: string]> = [
  [["postgres", "pg", "psql", "postgresql"], "postgres"],
  [["mysql", "mariadb"], "mysql"],
  [["redis"], "redis"],
  [["mongo", "mongodb"], "mongodb"],
  [["elastic", "elasticsearch"], "elasticsearch"],
  [["meili", "meilisearch"], "meilisearch"],
  [["rabbit", "rabbitmq"], "rabbitmq"],
  [["kafka"], "kafka"],
];

/**
 * Range key for a service, guessed from its name or image
 */
export function inferServiceType(serviceName: string, image?: string): string {
  const name = serviceName.toLowerCase();
  const imageName = (image ?? "").toLowerCase();

  for (const [keywords, type] of SERVICE_TYPES) {
    if (keywords.some((keyword) => name.includes(keyword) || imageName.includes(keyword))) {
      return type;
    }
  }
  return "default";
}
