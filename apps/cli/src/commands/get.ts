import { Command } from "commander";
import chalk from "chalk";
import { getContext } from "@devports/core";
import { getRuntime } from "../runtime.js";
import { bookService } from "../booking.js";
import { fail } from "../output.js";

interface GetOptions {
  quiet?: boolean;
  book: boolean;
}

export function registerGetCommand(program: Command): void {
  program
    .command("get <service>")
    .description("Get the port for a service in the current context, booking one if needed")
    .option("-q, --quiet", "Output only the port number")
    .option("--no-book", "Do not book a port when none is allocated")
    .addHelpText("after", "\nExamples:\n  devports get postgres\n  PGPORT=$(devports get postgres -q)")
    .action(async (service: string, options: GetOptions) => {
      try {
        const { registry, allocator } = getRuntime();
        const context = await getContext();

        let port: number;
        const existing = registry.getAllocation(context.hash, service);

        if (existing) {
          registry.touch(existing.id);
          port = existing.port;
        } else if (options.book) {
          port = (await bookService(registry, allocator, context, { service })).port;
        } else {
          console.error(chalk.yellow(`No port allocated for '${service}' in current context`));
          process.exit(1);
        }

        if (options.quiet) {
          console.log(port);
        } else {
          console.log(`${chalk.green(service)}: ${port}`);
        }
      } catch (error) {
        fail(error);
      }
    });
}
