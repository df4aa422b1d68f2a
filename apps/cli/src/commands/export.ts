import { Command, InvalidArgumentError } from "commander";
import { discoverServices, formatExport, getContext } from "@devports/core";
import { EXPORT_FORMATS, type ExportFormat } from "@devports/shared";
import { getRuntime } from "../runtime.js";
import { bookService } from "../booking.js";
import { fail } from "../output.js";

interface ExportOptions {
  auto?: boolean;
  composeFile?: string;
  format: ExportFormat;
}

function parseFormat(value: string): ExportFormat {
  const format = EXPORT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new InvalidArgumentError(`Format must be one of: ${EXPORT_FORMATS.join(", ")}.`);
  }
  return format;
}

export function registerExportCommand(program: Command): void {
  program
    .command("export")
    .description("Print the current context's ports as environment variables")
    .option("--auto", "Book discovered services before exporting")
    .option("-f, --compose-file <file>", "Compose file to read instead of the standard names")
    .option("--format <format>", "Output format: shell, json, env", parseFormat, "shell")
    .addHelpText("after", '\nDesigned for direnv:\n  eval "$(devports export --auto)"')
    .action(async (options: ExportOptions) => {
      try {
        const { registry, allocator, logger } = getRuntime();
        const context = await getContext();

        if (options.auto) {
          for (const discovered of discoverServices({ composeFile: options.composeFile, logger })) {
            try {
              await bookService(registry, allocator, context, {
                service: discovered.name,
                containerPort: discovered.containerPort,
                envVar: discovered.envVar,
                image: discovered.image,
                source: discovered.source,
              });
            } catch (error) {
              // Output is eval'd by the shell, so failures only go to the log
              logger.warn({ service: discovered.name, err: error }, "Could not book discovered service");
            }
          }
        }

        console.log(formatExport(registry.listByContext(context.hash), context, options.format));
      } catch (error) {
        fail(error);
      }
    });
}
