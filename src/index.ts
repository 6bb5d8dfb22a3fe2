#!/usr/bin/env node

/**
 * docscout - Main Entry Point
 */

import { run } from './cli.js';

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  console.error('[FATAL] Unhandled Rejection:', reason);
  process.exit(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  console.error('[FATAL] Uncaught Exception:', error);
  process.exit(1);
});

// Execute the CLI program
run().catch((error) => {
  console.error('[FATAL] Failed to run docscout:', error);
  process.exit(1);
});
