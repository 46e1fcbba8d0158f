/**
 * Terminal output helpers for the CLI.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';

const coolGradient = gradient(['#00F5FF', '#00D4FF', '#00B4FF']);

/**
 * Print nl2sql banner.
 */
export function printBanner(): void {
  console.log(
    boxen(`${coolGradient('nl2sql')}\n${chalk.gray('ask the DVD rental database in plain English')}`, {
      padding: { top: 0, bottom: 0, left: 2, right: 2 },
      borderStyle: 'round',
      borderColor: 'cyan',
    })
  );
}

/**
 * Success message.
 */
export function success(message: string): void {
  console.log(`${chalk.green('✔')} ${message}`);
}

/**
 * Error message.
 */
export function error(message: string, suggestion?: string): void {
  console.log(`${chalk.red('✖')} ${message}`);
  if (suggestion) {
    console.log(`  ${chalk.yellow('→')} ${chalk.dim(suggestion)}`);
  }
}

/**
 * Info message.
 */
export function info(message: string): void {
  console.log(`${chalk.blue('ℹ')} ${message}`);
}

/**
 * Create a spinner.
 */
export function spinner(text: string): ReturnType<typeof ora> {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  }).start();
}

/**
 * Print code block.
 */
export function code(content: string, language?: string): void {
  const border = chalk.gray('─'.repeat(50));
  console.log(border);
  if (language) {
    console.log(chalk.gray(`# ${language}`));
  }
  console.log(chalk.cyan(content));
  console.log(border);
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  console.log('');
  console.log(coolGradient(`▶ ${title}`));
  console.log(chalk.gray('─'.repeat(50)));
}

/**
 * Print empty line.
 */
export function newline(): void {
  console.log('');
}

/**
 * Print plain output (tables, JSON, DDL).
 */
export function plain(text: string): void {
  console.log(text);
}
