#!/usr/bin/env node
/**
 * CLI entry point script.
 *
 * This is the executable entry point for the `pullview` command.
 * It simply invokes the main function from the index module.
 *
 * @packageDocumentation
 */
import { main } from './index.js';

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
