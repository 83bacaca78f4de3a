#!/usr/bin/env node
/**
 * Agent client CLI
 * Configuration comes from AGENT_* environment variables; flags override it.
 */

import { createProgram } from './cli/program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error('agent-client failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
