/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
pairmap - mapper purity checks v${VERSION}

USAGE:
  pairmap <command> [options]

COMMANDS:
  check [paths...]          Check mapper classes (paths replace 'include')
  help                      Show help
  version                   Show version

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Only print diagnostics
  -c, --config <file>       Config file path (default: nearest pairmap.json)

CHECK OPTIONS:
  --base <name>             Also treat subclasses of <name> as mappers

EXIT CODES:
  0  No errors
  1  Usage or configuration error
  2  Mapper errors found
  3  Config file given with --config not found

EXAMPLES:
  pairmap check
  pairmap check src/mappers --base Profile
  pairmap check -c config/pairmap.json
`);
};
