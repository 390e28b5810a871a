/**
 * CLI output helpers with colors and formatting.
 */

import chalk from 'chalk';
import ora from 'ora';
import boxen from 'boxen';
import gradient from 'gradient-string';

const coolGradient = gradient(['#00F5FF', '#00D4FF', '#00B4FF']);
const successGradient = gradient(['#00ff88', '#00cc77']);
const errorGradient = gradient(['#ff4444', '#cc0000']);

/**
 * Print runsift banner.
 */
export function printBanner(): void {
  console.log(`\n  ${coolGradient('runsift')}  ${chalk.gray('ask your evaluation runs')}\n`);
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

export function warn(message: string): void {
  console.log(`${chalk.yellow('⚠')} ${message}`);
}

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
 * Print success box.
 */
export function successBox(message: string, title?: string): void {
  console.log(
    boxen(successGradient(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'green',
      title,
      titleAlignment: 'center',
    })
  );
}

/**
 * Print error box.
 */
export function errorBox(message: string, title?: string): void {
  console.log(
    boxen(errorGradient(message), {
      padding: 1,
      margin: 1,
      borderStyle: 'round',
      borderColor: 'red',
      title: title || 'Error',
      titleAlignment: 'center',
    })
  );
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

export function newline(): void {
  console.log('');
}

/**
 * Print a table row.
 */
export function row(label: string, value: string, ok: boolean = true): void {
  const icon = ok ? chalk.green('✔') : chalk.red('✖');
  console.log(`  ${icon} ${chalk.bold(label)}: ${chalk.cyan(value)}`);
}
