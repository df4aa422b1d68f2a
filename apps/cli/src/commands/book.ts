import { Command, InvalidArgumentError } from "commander";
import chalk from "chalk";
import { discoverServices, getContext } from "@devports/core";
import { getRuntime } from "../runtime.js";
import { bookService } from "../booking.js";
import { fail } from "../output.js";

interface BookOptions {
  port?: number;
  auto?: boolean;
  composeFile?: string;
  quiet?: boolean;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Port must be an integer between 1 and 65535.");
  }
  return port;
}

export function registerBookCommand(program: Command): void {
  program
    .command("book [service]")
    .description("Book port(s) for service(s) in the current context")
    .option("-p, --port <port>", "Preferred port", parsePort)
    .option("--auto", "Book every service discovered in the compose file")
    .option("-f, --compose-file <file>", "Compose file to read instead of the standard names")
    .option("-q, --quiet", "Minimal output")
    .action(async (service: string | undefined, options: BookOptions) => {
      try {
        const { registry, allocator, logger } = getRuntime();
        const context = await getContext();

        if (options.auto) {
          const services = discoverServices({ composeFile: options.composeFile, logger });
          if (services.length === 0) {
            console.log(chalk.yellow(`No services discovered from ${options.composeFile ?? "docker-compose.yml"}`));
            return;
          }

          let failed = false;
          for (const discovered of services) {
            try {
              const outcome = await bookService(registry, allocator, context, {
                service: discovered.name,
                containerPort: discovered.containerPort,
                envVar: discovered.envVar,
                image: discovered.image,
                source: discovered.source,
              });
              if (options.quiet) {
                continue;
              }
              if (outcome.created) {
                console.log(`${chalk.green(outcome.service)}: ${outcome.port}`);
              } else {
                console.log(chalk.gray(`${outcome.service}: ${outcome.port} (already allocated)`));
              }
            } catch (error) {
              failed = true;
              console.error(
                chalk.red(`Error allocating ${discovered.name}:`),
                error instanceof Error ? error.message : error
              );
            }
          }

          if (failed) {
            process.exit(1);
          }
          return;
        }

        if (!service) {
          console.error(chalk.red("Error:"), "Either specify a service or use --auto");
          process.exit(1);
        }

        const outcome = await bookService(registry, allocator, context, {
          service,
          preferredPort: options.port,
        });

        if (!outcome.created) {
          console.log(`${chalk.yellow(`${service} already allocated:`)} ${outcome.port}`);
        } else if (options.quiet) {
          console.log(outcome.port);
        } else {
          console.log(`${chalk.green(service)}: ${outcome.port}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
