/**
 * CLI Utilities
 *
 * Shared helpers so every command resolves global options the same way
 */

import type { Command } from 'commander';
import { loadConfig, type CalculatorConfig } from '../config.js';

/**
 * Global CLI options that can be set on any command
 */
export type GlobalOptions = {
  logLevel?: string;
  jsonLogs?: boolean;
  fractionDigits?: string;
};

/**
 * Commander stores global options on the program root, so walk up the
 * parent chain to find them.
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  let current: Command = command;
  while (current.parent) {
    current = current.parent;
  }

  const opts = current.opts<GlobalOptions>();
  return {
    logLevel: opts.logLevel,
    jsonLogs: opts.jsonLogs,
    fractionDigits: opts.fractionDigits,
  };
}

/**
 * Environment configuration with this command's global flags applied on top
 */
export function resolveConfig(command: Command, env: NodeJS.ProcessEnv = process.env): CalculatorConfig {
  const options = getGlobalOptions(command);
  return loadConfig(env, {
    logLevel: options.logLevel,
    jsonLogs: options.jsonLogs ? true : undefined,
    fractionDigits: options.fractionDigits,
  });
}

export function isTTY(): boolean {
  return process.stdin.isTTY === true;
}
