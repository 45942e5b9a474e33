import chalk from "chalk";

let globalQuiet = false;

export function setQuiet(quiet: boolean): void {
  globalQuiet = quiet;
}

/**
 * Print success message
 */
export function success(message: string): void {
  if (!globalQuiet) {
    console.log(chalk.green("✓"), message);
  }
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.error(chalk.red("✗"), message);
}

export function warn(message: string): void {
  if (!globalQuiet) {
    console.log(chalk.yellow("!"), message);
  }
}

export function info(message: string): void {
  if (!globalQuiet) {
    console.log(chalk.blue("ℹ"), message);
  }
}

/**
 * Print one labelled value, e.g. `State: ready`
 */
export function detail(label: string, value: unknown): void {
  const text = value === null || value === undefined ? chalk.dim("-") : String(value);
  console.log(`${chalk.bold(`${label}:`)} ${text}`);
}

export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}
