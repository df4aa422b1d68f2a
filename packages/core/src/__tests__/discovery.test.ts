import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { discoverServices, inferServiceType, parsePortDefinition } from "../services/discovery.js";

const COMPOSE = `
services:
  db:
    image: postgres:16
    ports:
      - "\${PG_PORT}:5432"
  cache:
    image: redis:7
    ports:
      - "6379"
  web:
    image: nginx
    ports:
      - "8080:80"
  search:
    image: getmeili/meilisearch
    ports:
      - published: "\${MEILI_PORT}"
        target: 7700
  worker:
    image: acme/worker
`;

describe("parsePortDefinition", () => {
  it.each([
    ["${PG_PORT}:5432", { containerPort: 5432, envVar: "PG_PORT" }],
    ["$PG_PORT:5432", { containerPort: 5432, envVar: "PG_PORT" }],
    ["$REDIS_PORT:6379/tcp", { containerPort: 6379, envVar: "REDIS_PORT" }],
    ["5432", { containerPort: 5432, envVar: "DB_PORT" }],
    ["5432/tcp", { containerPort: 5432, envVar: "DB_PORT" }],
  ])("parses %s", (definition, expected) => {
    expect(parsePortDefinition(definition, "db")).toEqual(expected);
  });

  it("treats a bare number as a container port", () => {
    expect(parsePortDefinition(5432, "db")).toEqual({ containerPort: 5432, envVar: "DB_PORT" });
  });

  it("parses the long form with a variable", () => {
    expect(parsePortDefinition({ published: "${PG_PORT}", target: 5432 }, "db")).toEqual({
      containerPort: 5432,
      envVar: "PG_PORT",
    });
  });

  it.each(["8080:80", "127.0.0.1:8080:80", "${PG_PORT}:abc"])("skips %s", (definition) => {
    expect(parsePortDefinition(definition, "db")).toBeUndefined();
  });

  it("skips the long form with a fixed published port", () => {
    expect(parsePortDefinition({ published: 8080, target: 80 }, "web")).toBeUndefined();
  });
});

describe("discoverServices", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "devports-discovery-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("finds services needing a host port in docker-compose.yml", () => {
    const file = join(dir, "docker-compose.yml");
    writeFileSync(file, COMPOSE);

    expect(discoverServices({ cwd: dir })).toEqual([
      { name: "db", containerPort: 5432, envVar: "PG_PORT", image: "postgres:16", source: file },
      { name: "cache", containerPort: 6379, envVar: "CACHE_PORT", image: "redis:7", source: file },
      { name: "search", containerPort: 7700, envVar: "MEILI_PORT", image: "getmeili/meilisearch", source: file },
    ]);
  });

  it("reads only the given compose file", () => {
    writeFileSync(join(dir, "docker-compose.yml"), COMPOSE);
    writeFileSync(join(dir, "compose.prod.yml"), 'services:\n  api:\n    ports:\n      - "${API_PORT}:3000"\n');

    expect(discoverServices({ cwd: dir, composeFile: "compose.prod.yml" })).toEqual([
      { name: "api", containerPort: 3000, envVar: "API_PORT", image: undefined, source: join(dir, "compose.prod.yml") },
    ]);
  });

  it("returns nothing when no compose file exists", () => {
    expect(discoverServices({ cwd: dir })).toEqual([]);
    expect(discoverServices({ cwd: dir, composeFile: "missing.yml" })).toEqual([]);
  });

  it("returns nothing for a file that is not valid YAML", () => {
    writeFileSync(join(dir, "compose.yaml"), "services: [unclosed");

    expect(discoverServices({ cwd: dir })).toEqual([]);
  });
});

describe("inferServiceType", () => {
  it.each([
    ["postgres", undefined, "postgres"],
    ["db", "postgres:16", "postgres"],
    ["db", "mariadb:11", "mysql"],
    ["my-redis", undefined, "redis"],
    ["Mongo", undefined, "mongodb"],
    ["search", "getmeili/meilisearch", "meilisearch"],
    ["broker", "rabbitmq:3-management", "rabbitmq"],
    ["web", "nginx", "default"],
  ])("maps %s (%s) to %s", (name, image, type) => {
    expect(inferServiceType(name, image)).toBe(type);
  });
});
