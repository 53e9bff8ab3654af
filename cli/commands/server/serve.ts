/**
 * Serve Command
 */

import { parseArgs, hasFlag } from '../../utils/args';
import { CONFIG_OPTIONS_HELP, resolveConfig } from '../../utils/config';
import { createContext } from '../../../src/context';
import { startServer } from '../../../src/server';

export default async function serve(args: string[]) {
  const parsed = parseArgs(args);

  if (hasFlag(parsed, 'help', 'h')) {
    console.log(`
Serve the alerts API

USAGE
  npm run cli serve [--port <n>] [options]

OPTIONS
  --port <n>                Listen port (default: 3000, or PORT)
${CONFIG_OPTIONS_HELP}
  --help, -h                Show this help message
    `);
    return;
  }

  startServer(createContext(resolveConfig(parsed)));
}
