#!/usr/bin/env tsx

/**
 * CLI entry point.
 *
 * @module
 */

import { createProgram } from "./program.ts";

await createProgram().parseAsync(process.argv);
