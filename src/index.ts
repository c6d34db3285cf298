#!/usr/bin/env node
/**
 * stager
 * Discover deployment targets, merge defaults and stage per-target resource archives
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
