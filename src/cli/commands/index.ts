/**
 * CLI Commands Registry
 *
 * Available commands:
 * - plan: Find and rank vendors for an event
 * - collect: Fill the vector store for fixed categories
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCollectCommand } from './collect.js';
import { registerPlanCommand } from './plan.js';
import type { CommandContext } from './shared.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command, context: CommandContext): void {
  registerPlanCommand(program, context);
  registerCollectCommand(program, context);
}

export type { CommandContext } from './shared.js';
