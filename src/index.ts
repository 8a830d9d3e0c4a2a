#!/usr/bin/env node
import { runCli } from './cli.js';
import { MacOSHost } from './host/index.js';
import { createLogger } from './utils/index.js';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2), { host: new MacOSHost() });
}

main().catch((err) => {
  createLogger().error('Fatal error:', err);
  process.exit(1);
});
