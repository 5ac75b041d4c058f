/**
 * CLI Commands Registry
 *
 * Available commands:
 * - run: Search, enrich, rank and write a results table
 * - serve: Serve a results table for search and fetch
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerRunCommand } from './run.js';
import { registerServeCommand } from './serve.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerServeCommand(program);
}

