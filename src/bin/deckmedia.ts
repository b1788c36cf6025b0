#!/usr/bin/env node
/**
 * deckmedia CLI entry point
 *
 * Compiled to dist/bin/deckmedia.js by TypeScript.
 * Registered as the `deckmedia` binary in package.json.
 */

import 'dotenv/config';
import { DeckMediaCLI } from '../cli/cli.js';

const cli = new DeckMediaCLI();
cli.run(process.argv).catch((err) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
