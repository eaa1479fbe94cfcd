#!/usr/bin/env node

/**
 * CLI entry point for the boxoffice-enrich command
 *
 * Thin wrapper around start.ts; loads .env before reading configuration.
 */

import 'dotenv/config';
import { start } from './start.js';

process.exitCode = await start(process.argv.slice(2), { handleSignals: true });
