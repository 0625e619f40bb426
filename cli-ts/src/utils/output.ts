/**
 * Output formatting utilities
 */

import chalk from 'chalk';

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
};

export function printSuccess(message: string): void {
  console.log(colors.success(`✓ ${message}`));
}

export function printError(message: string): void {
  console.error(colors.error(`✗ ${message}`));
}

export function printWarning(message: string): void {
  console.log(colors.warning(`⚠ ${message}`));
}

export function printInfo(message: string): void {
  console.log(colors.info(`→ ${message}`));
}

export function printDim(message: string): void {
  console.log(colors.dim(message));
}

export function printBlank(): void {
  console.log('');
}

export function printRaw(message: string): void {
  console.log(message);
}

export function printHeader(title: string): void {
  const line = '='.repeat(56);
  console.log(colors.success(line));
  console.log(colors.success(`   ${title}`));
  console.log(colors.success(line));
}

export function printSection(title: string): void {
  console.log('');
  console.log(colors.info(`=== ${title} ===`));
}

export function printKeyValue(key: string, value: string): void {
  console.log(`${colors.dim(key + ':')} ${value}`);
}

/**
 * Indent every line of a command's captured output
 */
export function indent(text: string, prefix: string = '  '): string {
  return text
    .trimEnd()
    .split('\n')
    .map(line => `${prefix}${line}`)
    .join('\n');
}

/**
 * Format duration in seconds to human readable
 */
export function formatDuration(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${mins}m`;
}
