import chalk from "chalk";

/**
 * Print a table with left-aligned columns sized to their widest cell
 */
export function printTable(title: string, headers: string[], rows: string[][]): void {
  const widths = headers.map((header, i) =>
    Math.max(header.length, ...rows.map((row) => (row[i] ?? "").length))
  );
  const format = (cells: string[]) =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();

  console.log(chalk.bold(`\n${title}`));
  console.log(chalk.gray(format(headers)));
  for (const row of rows) {
    console.log(format(row));
  }
  console.log();
}

/**
 * Report an error on stderr and exit with status 1
 */
export function fail(error: unknown): never {
  console.error(chalk.red("Error:"), error instanceof Error ? error.message : error);
  process.exit(1);
}
