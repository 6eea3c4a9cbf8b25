#!/usr/bin/env node

/**
 * tapcalc CLI
 *
 * Drives the calculator engine from the terminal: one-shot key strings or an
 * interactive session.
 */

import { Command } from 'commander';
import * as readline from 'readline';
import chalk from 'chalk';
import { createConfiguredLogger } from './config.js';
import { CalculatorEngine } from './engine.js';
import { evaluateLine, REPL_COMMANDS } from './repl.js';
import { reportFailedSteps, runInput, type SessionStep } from './session.js';
import {
  formatKeyTable,
  formatState,
  formatTraceLine,
  printDisplay,
  printError,
  printHeader,
  printInfo,
  printLines,
} from './cli-formatter.js';
import { handleError, ValidationError } from './shared/error-handler.js';
import { logger as rootLogger, type Logger } from './shared/logger.js';
import { isTTY, resolveConfig } from './shared/cli-utils.js';
import { TAPCALC_VERSION } from './version.js';

interface PressOptions {
  trace?: boolean;
  json?: boolean;
}

interface CommandContext {
  engine: CalculatorEngine;
  logger: Logger;
}

function createContext(command: Command): CommandContext {
  const config = resolveConfig(command);
  const logger = createConfiguredLogger(config, 'cli');
  const engine = new CalculatorEngine({ logger, fractionDigits: config.fractionDigits });
  logger.debug('Configuration loaded', { ...config });
  return { engine, logger };
}

function printSteps(steps: SessionStep[]): void {
  printLines(steps.map((step, index) => formatTraceLine(step, index)));
}

async function runRepl(context: CommandContext): Promise<void> {
  const { engine } = context;
  // Warnings interleave with the prompt, so drop timestamps and levels there
  const logger = context.logger.child({ scope: 'repl', minimal: true });
  const interactive = isTTY();
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: chalk.dim('tapcalc> '),
    terminal: interactive,
  });

  if (interactive) {
    printInfo('Type keys such as 12+3= and press Enter. .help lists commands.');
    printDisplay(engine.display);
    rl.prompt();
  }

  for await (const line of rl) {
    const outcome = evaluateLine(engine, line);
    switch (outcome.type) {
      case 'exit':
        rl.close();
        return;
      case 'state':
        printLines(formatState(outcome.snapshot));
        break;
      case 'help':
        printHeader('Commands');
        printLines(REPL_COMMANDS.map((entry) => `  ${entry.name.padEnd(8)} ${entry.description}`));
        printHeader('Keys');
        printLines(formatKeyTable());
        break;
      case 'unknown-command':
        printError(`Unknown command: ${outcome.command}`);
        break;
      case 'keys':
        reportFailedSteps(outcome.steps, logger);
        printDisplay(outcome.display);
        break;
    }
    if (interactive) {
      rl.prompt();
    }
  }
}

const program = new Command();

program
  .name('tapcalc')
  .description('Four-function calculator driven by key presses')
  .version(TAPCALC_VERSION)
  .option('--log-level <level>', 'Log level: error | warn | info | debug')
  .option('--json-logs', 'Write log lines as JSON')
  .option('--fraction-digits <n>', 'Fractional digits kept when rounding results (0-15)');

program
  .command('press')
  .argument('<keys...>', 'Key strings, e.g. "1.5+2.5=" or "7[neg]"')
  .description('Press keys on a fresh calculator and print the display')
  .option('--trace', 'Print the display after every key')
  .option('--json', 'Print display, state and steps as JSON')
  .action((inputs: string[], options: PressOptions, command: Command) => {
    let logger: Logger = rootLogger;
    try {
      const context = createContext(command);
      logger = context.logger;
      const steps = inputs.flatMap((input) => runInput(context.engine, input));

      if (steps.length === 0) {
        throw new ValidationError('No keys given', { inputs }, 'Pass at least one key, e.g. tapcalc press "2+2="');
      }

      if (options.json) {
        console.log(JSON.stringify({
          display: context.engine.display,
          state: context.engine.snapshot(),
          steps: steps.map((step) => ({
            key: step.label,
            display: step.display,
            error: step.error?.code,
          })),
        }, null, 2));
        return;
      }

      if (options.trace) {
        printSteps(steps);
      } else {
        reportFailedSteps(steps, logger);
      }
      printDisplay(context.engine.display);
    } catch (error) {
      handleError(error, { logger, exitOnError: true });
    }
  });

program
  .command('repl')
  .description('Start an interactive calculator session')
  .action(async (_options: Record<string, unknown>, command: Command) => {
    let logger: Logger = rootLogger;
    try {
      const context = createContext(command);
      logger = context.logger;
      await runRepl(context);
    } catch (error) {
      handleError(error, { logger, exitOnError: true });
    }
  });

program
  .command('keys')
  .description('List the keys and the tokens that press them')
  .action(() => {
    printHeader('Keys');
    printLines(formatKeyTable());
  });

program.parseAsync().catch((error: unknown) => {
  handleError(error, { exitOnError: true });
});
