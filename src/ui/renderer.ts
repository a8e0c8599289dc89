import chalk from 'chalk';

export function printJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

export function printError(message: string): void {
  process.stderr.write(chalk.red(`Error: ${message}`) + '\n');
}

export function printSuccess(message: string): void {
  process.stderr.write(chalk.green(message) + '\n');
}

export function heading(text: string): string {
  return chalk.bold(text);
}

export function dim(text: string): string {
  return chalk.dim(text);
}
