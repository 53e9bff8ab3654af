#!/usr/bin/env -S npx tsx
/**
 * Campus Stress Alerts CLI
 *
 * Command-line interface for running the pipeline and inspecting its output
 */

import { readFileSync } from 'node:fs';

interface CommandConfig {
  description: string;
  file: string;
  usage: string;
}

type CommandModule = {
  default: (args: string[], command: string) => Promise<void>;
};

const COMMANDS: Record<string, CommandConfig> = {
  // Pipeline commands
  'ingest': {
    description: 'Run one batch file through filter, inference and storage',
    file: './commands/pipeline/ingest.ts',
    usage: 'ingest [<file>] [--bucket <name> --key <key>] [--dry-run] [--json]'
  },

  // Query commands
  'alerts:query': {
    description: 'List stored alerts for one source file',
    file: './commands/alerts/query.ts',
    usage: 'alerts:query <source_file> [--format <table|json|csv>]'
  },

  // Model commands
  'model:verify': {
    description: 'Check the classifier artifact against the feature layout',
    file: './commands/model/verify.ts',
    usage: 'model:verify [--model <path>]'
  },

  // Server commands
  'serve': {
    description: 'Serve the alerts HTTP API',
    file: './commands/server/serve.ts',
    usage: 'serve [--port <n>]'
  }
};

function showHelp() {
  const width = Math.max(...Object.keys(COMMANDS).map((name) => name.length)) + 4;
  const lines = Object.entries(COMMANDS).map(
    ([name, config]) => `  ${name.padEnd(width)}${config.description}`
  );

  console.log(`
Campus Stress Alerts CLI

Usage: npm run cli <command> [options]

COMMANDS
${lines.join('\n')}

OPTIONS
  --help, -h                Show this help message
  --version, -v             Show version

EXAMPLES
  npm run cli ingest resources/sample_readings.csv
  npm run cli alerts:query sample_readings.csv --format json
  npm run cli model:verify
  PORT=8080 npm run cli serve

For detailed command help: npm run cli <command> --help
`);
}

function showVersion() {
  const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
  const version = pkg !== null && typeof pkg === 'object' && 'version' in pkg ? String(pkg.version) : 'unknown';
  console.log(`Campus Stress Alerts CLI v${version}`);
}

function isCommandModule(value: unknown): value is CommandModule {
  return value !== null && typeof value === 'object' && 'default' in value && typeof value.default === 'function';
}

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    process.exit(0);
  }

  if (args[0] === '--version' || args[0] === '-v') {
    showVersion();
    process.exit(0);
  }

  const command = args[0];
  const commandConfig = COMMANDS[command];

  if (!commandConfig) {
    console.error(`❌ Unknown command: ${command}\n`);
    console.error('Run "npm run cli --help" to see available commands');
    process.exit(1);
  }

  try {
    const commandModule: unknown = await import(new URL(commandConfig.file, import.meta.url).href);
    if (!isCommandModule(commandModule)) {
      throw new Error(`${commandConfig.file} has no default export`);
    }

    // Pass remaining args to command, and command name for multi-command handlers
    await commandModule.default(args.slice(1), command);
  } catch (error) {
    console.error(`❌ Error executing command "${command}":`, error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
