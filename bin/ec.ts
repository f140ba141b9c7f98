#!/usr/bin/env node
// bin/ec.ts
// ec command: runs start-up files and scripts, then an interactive session
//
// Run:  npx tsx bin/ec.ts [options] [scripts...]

import * as readline from "readline";
import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  expandHome,
  type CliConfig,
} from "./ec-cli-lib";
import {
  createCalculator,
  describeFailure,
  isFail,
  loadConfig,
  runScript,
  validateConfig,
  type Evaluator,
  type LineTrace,
  type MessageSink,
  type ScriptPolicy,
} from "../src";

// ═══════════════════════════════════════════════════════════════════════════════
// CONSOLE SINK
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Warnings stay quiet until the interactive session starts, so start-up
 * files may override built-ins without noise.
 */
class ConsoleSink implements MessageSink {
  quiet = true;

  message(text: string): void {
    console.log(text);
  }

  warning(text: string): void {
    if (!this.quiet) console.error(`warning: ${text}`);
  }

  error(text: string): void {
    console.error(text);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main() {
  // Parse command-line arguments
  const cliArgs = parseCliArgs(process.argv.slice(2));

  // Handle --help
  if (cliArgs.help) {
    console.log(getHelpText());
    process.exit(0);
  }

  // Handle --version
  if (cliArgs.version) {
    console.log(getVersion());
    process.exit(0);
  }

  const cli = buildConfig(cliArgs);
  const config = loadConfig({
    configFile: cli.configFile,
    overrides: cli.startupFile ? { startup: { file: cli.startupFile } } : undefined,
  });

  const validation = validateConfig(config);
  for (const w of validation.warnings) console.error(`warning: ${w}`);
  if (!validation.valid) {
    for (const e of validation.errors) console.error(`error: ${e}`);
    process.exit(1);
  }

  const sink = new ConsoleSink();
  const calc = createCalculator(config, { sink });
  const policy: ScriptPolicy = cli.interactive ? "interactive" : "fatal";

  // Start-up files: rc files are optional, the start-up file is not
  for (const rc of config.startup.rcFiles) {
    const file = expandHome(rc);
    if (fs.existsSync(file)) runSource(calc, fs.readFileSync(file, "utf8"), file, policy, cli, sink);
  }
  if (config.startup.file) {
    const file = expandHome(config.startup.file);
    if (!fs.existsSync(file)) {
      console.error(`${config.startup.file}: no such file.`);
      process.exit(1);
    }
    runSource(calc, fs.readFileSync(file, "utf8"), file, policy, cli, sink);
  }
  calc.clearStack();

  // Scripts
  for (const arg of cli.scripts) {
    const file = expandHome(arg);
    if (fs.existsSync(file) && fs.statSync(file).isFile()) {
      runSource(calc, fs.readFileSync(file, "utf8"), file, policy, cli, sink);
    } else {
      runSource(calc, arg, "<arg>", policy, cli, sink);
    }
    if (calc.exitRequested) break;
  }

  if (cli.interactive && !calc.exitRequested) {
    sink.quiet = false;
    await replMode(calc, cli);
    return;
  }

  console.log(calc.display());
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCRIPT MODE
// ═══════════════════════════════════════════════════════════════════════════════

function runSource(
  calc: Evaluator,
  text: string,
  source: string,
  policy: ScriptPolicy,
  cli: CliConfig,
  sink: MessageSink
): void {
  const result = runScript(calc, text, {
    source,
    policy,
    sink,
    onLine: cli.verbose ? logLine : undefined,
  });

  if (isFail(result)) {
    const lineNo = result.failure.context?.line;
    const line = typeof lineNo === "number" ? text.split(/\r?\n/)[lineNo - 1] : undefined;
    console.error(describeFailure(result.failure, line));
    process.exit(1);
  }
}

function logLine(trace: LineTrace): void {
  console.log(`${trace.source}:${trace.line}: ${trace.text.trim()} ==> ${trace.display ?? "(failed)"}`);
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

function evaluateLine(calc: Evaluator, line: string, cli: CliConfig): void {
  if (cli.verbose) {
    const toks = calc.split(line);
    if (!isFail(toks)) console.log(`tokens: ${toks.value.join(" ")}`);
  }
  const result = calc.evaluate(line);
  if (isFail(result)) {
    console.error(describeFailure(result.failure, line));
  }
}

async function replMode(calc: Evaluator, cli: CliConfig): Promise<void> {
  // For non-TTY (piped) input, process line by line
  if (!process.stdin.isTTY) {
    const rl = readline.createInterface({ input: process.stdin });
    try {
      for await (const line of rl) {
        evaluateLine(calc, line, cli);
        if (calc.exitRequested) break;
      }
    } finally {
      rl.close();
      process.stdin.pause();
    }
    console.log(calc.display());
    return;
  }

  // TTY interactive mode
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: calc.prompt(),
  });

  rl.prompt();

  rl.on("line", (line) => {
    evaluateLine(calc, line, cli);
    if (calc.exitRequested) {
      rl.close();
      return;
    }
    rl.setPrompt(calc.prompt());
    rl.prompt();
  });

  await new Promise<void>((resolve) => {
    rl.on("close", () => {
      console.log("");
      resolve();
    });
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
