#!/usr/bin/env node
/**
 * srpack CLI
 * Packages changed Salesforce static resources into a change-set deployment directory
 */

import { runCLI } from './cli/index.js';

// Run the CLI
runCLI().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
