#!/usr/bin/env node
/**
 * CLI entry point script.
 *
 * This is the executable entry point for the `flashless` command.
 * It runs the main function and exits with its code.
 *
 * @packageDocumentation
 */
import { main } from './index.js';

process.exitCode = await main(process.argv);
