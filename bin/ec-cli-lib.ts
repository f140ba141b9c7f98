// bin/ec-cli-lib.ts
// Shared CLI utilities for the ec command
// Exported functions for testing

import * as fs from "fs";
import * as os from "os";
import * as path from "path";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  interactive?: boolean;
  verbose?: boolean;
  startup?: string;
  config?: string;
  scripts: string[];
};

export type CliConfig = {
  /** Run the interactive loop after the scripts */
  interactive: boolean;
  verbose: boolean;
  startupFile?: string;
  configFile?: string;
  scripts: string[];
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { scripts: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-V") {
      result.version = true;
    } else if (arg === "--interactive" || arg === "-i") {
      result.interactive = true;
    } else if (arg === "--verbose" || arg === "-v") {
      result.verbose = true;
    } else if (arg === "--startup" || arg === "-s") {
      result.startup = args[++i];
    } else if (arg === "--config") {
      result.config = args[++i];
    } else if (arg === "--") {
      result.scripts.push(...args.slice(i + 1));
      break;
    } else {
      // Anything else is a script: a file name or a line to evaluate.
      // Lines may start with "-" (e.g. "-3 chs"), so unknown flags are scripts too.
      result.scripts.push(arg);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
ec - engineering calculator

USAGE:
  ec [options]                       Start an interactive session
  ec [options] <script>...           Run scripts, print x and exit

Each script is a file name if such a file exists, otherwise it is
evaluated as a line of input, e.g.  ec '4 5 +'

OPTIONS:
  -h, --help                         Show this help message
  -V, --version                      Show version information
  -i, --interactive                  Stay interactive after running scripts
  -s, --startup <file>               Run file after the rc files
  -v, --verbose                      Show each line's tokens and result
  --config <file>                    Read configuration from file (.json, .yaml)

START-UP:
  ~/.ecrc and ./.ecrc run first (if present), then the start-up file.
  The stack is cleared afterwards; variables and functions persist.

EXAMPLES:
  ec                                 # Start a session
  ec '100 100 ||'                    # Parallel combination: 50
  ec -s consts.ec -i                 # Load definitions, then interact

Type 'help' or '?' in a session for the list of actions.
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  // Source tree: bin/../package.json; build output: dist/bin/../../package.json
  for (const pkgPath of [path.join(__dirname, "..", "package.json"), path.join(__dirname, "..", "..", "package.json")]) {
    if (!fs.existsSync(pkgPath)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `ec v${pkg.version}`;
    }
  }
  return "ec v1.0.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: CliArgs): CliConfig {
  const config: CliConfig = {
    interactive: args.scripts.length === 0 || args.interactive === true,
    verbose: args.verbose || false,
    scripts: args.scripts,
  };

  if (args.startup) {
    config.startupFile = args.startup;
  }

  if (args.config) {
    config.configFile = args.config;
  }

  return config;
}

/** Replace a leading "~" with the home directory. */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === "~") return home;
  if (p.startsWith("~/")) return path.join(home, p.slice(2));
  return p;
}
