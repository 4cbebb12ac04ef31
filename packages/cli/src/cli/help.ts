/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
Methodical - structural type checker for method-set types v${VERSION}

USAGE:
  methodical <command> [program] [options]

COMMANDS:
  check [program]           Infer every class and check every site
  infer [program]           Print the inferred method-set of every class

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Report each pass
  -q, --quiet               Print diagnostics only
  -c, --config <file>       Config file path (default: methodical.json)

OUTPUT OPTIONS:
  -f, --format <format>     Output format: text or json
  -m, --max-diagnostics <n> Print at most n diagnostics

EXAMPLES:
  methodical check
  methodical check programs/streams.json --format json
  methodical infer programs/streams.json
`);
};
