/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Color a dispatcher log line by its tag
 */
export function colorizeLogLine(line: string): string {
  if (line.startsWith('[OK]')) return chalk.green('[OK]') + line.slice(4);
  if (line.startsWith('[FAIL]')) return chalk.red('[FAIL]') + line.slice(6);
  if (line.startsWith('==')) return chalk.bold(line);
  return line;
}
