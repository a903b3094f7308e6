#!/usr/bin/env node
/**
 * graphvcs CLI entry point
 *
 * Inspects the resolved configuration and prepares repository layouts.
 */

import { Command } from 'commander';
import { registerConfigCommand } from './commands/config.js';
import { registerPathsCommand } from './commands/paths.js';
import { registerInitCommand } from './commands/init.js';
import { VERSION } from '../index.js';

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('graphvcs')
    .description('Graph-based version control: configuration and logging')
    .version(VERSION);

  registerConfigCommand(program);
  registerPathsCommand(program);
  registerInitCommand(program);

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander handles most errors, but catch any unexpected ones
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Run the CLI
void main();
