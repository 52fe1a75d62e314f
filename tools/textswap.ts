#!/usr/bin/env node
/**
 * textswap.ts - Bulk find and replace across a directory tree
 *
 * Usage:
 *   npm run textswap -- <directory> 'search:replace' [...]
 *   npm run textswap -- ./src 'hello:hi' -i -e .ts --dry-run
 *   npm run textswap -- ./docs --rules renames.json --json
 *
 * Rules run longest search first (--no-sort keeps the given order); each
 * rule runs once over the output of the previous one.
 */

import { createProgram } from "./lib/cli"

createProgram().parse()
