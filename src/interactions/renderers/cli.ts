/**
 * CLI Renderer
 *
 * Renders interactions using inquirer prompts and ora spinner.
 * Maps interaction primitives to CLI-specific implementations.
 *
 * @module interactions/renderers/cli
 */

import { select, input, password, confirm, Separator } from '@inquirer/prompts';
import ora from 'ora';
import chalk from 'chalk';
import type {
  Renderer,
  SelectInteraction,
  InputInteraction,
  ConfirmInteraction,
  ProgressInteraction,
  DisplayInteraction,
  DisplayFormat,
  ProgressHandle,
} from '../types.js';

type Styled = (text: string) => string;

const prefixMap: Record<Exclude<DisplayFormat, 'heading' | 'plain'>, string> = {
  info: chalk.blue('i'),
  success: chalk.green('✓'),
  warning: chalk.yellow('⚠'),
  error: chalk.red('✗'),
};

const colorMap: Record<Exclude<DisplayFormat, 'heading' | 'plain'>, Styled> = {
  info: chalk.white,
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
};

/**
 * CLI renderer implementation
 *
 * Uses:
 * - @inquirer/prompts for select, input, password, confirm
 * - ora for progress spinners
 * - chalk for colored output
 */
export const cliRenderer: Renderer = {
  /**
   * Render select interaction with arrow key navigation
   */
  async select(interaction: SelectInteraction): Promise<string | null> {
    const choices = interaction.options.map((opt) => {
      if (opt.separator) {
        return new Separator(chalk.cyan(opt.label));
      }

      let name = '';
      if (opt.icon) {
        name += `${opt.icon} `;
      }
      name += opt.label;
      if (opt.description) {
        name += `  ${chalk.dim(opt.description)}`;
      }

      return { name, value: opt.id };
    });

    try {
      return await select({
        message: interaction.message,
        choices,
        pageSize: Math.max(choices.length, 1),
        loop: false,
      });
    } catch {
      // User cancelled (Ctrl+C)
      return null;
    }
  },

  /**
   * Render input interaction; masked input uses the password prompt
   */
  async input(interaction: InputInteraction): Promise<string | null> {
    const validate = interaction.validate;

    try {
      if (interaction.mask) {
        const passwordConfig: {
          message: string;
          mask: string;
          validate?: (value: string) => string | true;
        } = {
          message: interaction.message,
          mask: '*',
        };
        if (validate) {
          passwordConfig.validate = (value) => validate(value) ?? true;
        }
        return await password(passwordConfig);
      }

      const inputConfig: {
        message: string;
        default?: string;
        validate?: (value: string) => string | true;
      } = {
        message: interaction.message,
      };
      if (interaction.placeholder !== undefined) {
        inputConfig.default = interaction.placeholder;
      }
      if (validate) {
        inputConfig.validate = (value) => validate(value) ?? true;
      }
      return await input(inputConfig);
    } catch {
      // User cancelled
      return null;
    }
  },

  /**
   * Render confirm interaction
   */
  async confirm(interaction: ConfirmInteraction): Promise<boolean> {
    try {
      const message = interaction.destructive
        ? chalk.red(interaction.message)
        : interaction.message;

      return await confirm({
        message,
        default: !interaction.destructive,
      });
    } catch {
      // User cancelled
      return false;
    }
  },

  /**
   * Start a progress spinner
   */
  progress(interaction: ProgressInteraction): ProgressHandle {
    const spinner = ora(interaction.message).start();

    return {
      update(message: string): void {
        spinner.text = message;
      },

      succeed(message?: string): void {
        spinner.succeed(message ?? interaction.message);
      },

      fail(message?: string): void {
        spinner.fail(message ?? interaction.message);
      },

      stop(): void {
        spinner.stop();
      },
    };
  },

  /**
   * Display a message with appropriate styling
   */
  async display(interaction: DisplayInteraction): Promise<void> {
    const format = interaction.format ?? 'info';

    if (format === 'heading') {
      printHeader(interaction.message);
      return;
    }

    if (format === 'plain') {
      console.log(interaction.message);
      return;
    }

    console.log(`${prefixMap[format]} ${colorMap[format](interaction.message)}`);
  },

  /**
   * Display a "Press Enter to continue" prompt
   */
  async waitForEnter(message = 'Press Enter to continue...'): Promise<void> {
    try {
      await input({ message: chalk.dim(message) });
    } catch {
      // Ignore cancellation
    }
  },
};

/**
 * Print a section header
 */
export function printHeader(title: string): void {
  console.log();
  console.log(chalk.cyan.bold(`  ${title}`));
  console.log(chalk.dim('  ' + '─'.repeat(50)));
}

/**
 * Print the application banner
 */
export function printBanner(version: string): void {
  console.log();
  console.log(chalk.cyan('  ╔═══════════════════════════════════════════════════════════╗'));
  console.log(chalk.cyan('  ║') + chalk.bold.white('           Tavus CLI                                       ') + chalk.cyan('║'));
  console.log(chalk.cyan('  ║') + chalk.dim(`     Replicas, personas, videos and conversations  v${version.padEnd(6)}`) + chalk.cyan('║'));
  console.log(chalk.cyan('  ╚═══════════════════════════════════════════════════════════╝'));
  console.log();
}
