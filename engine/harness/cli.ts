#!/usr/bin/env node
/**
 * Row Focus Headless Harness - CLI Entry Point
 *
 * Usage:
 *   npm run harness -- [options]
 *   npm run harness -- --pretty < session.txt
 *   echo "ROWS a b c" | npm run harness
 *
 * Options:
 *   --pretty        Human-readable output (default: JSON)
 *   --no-timestamps Omit timestamps from output
 *   --stop-on-error Stop execution on first error
 *   --echo          Echo commands before executing
 *   --verbose       Verbose mode with extra logging
 *   --max-steps <n> Maximum commands per piped script
 *   --help          Show help message
 *
 * Interactive mode:
 *   Run without piped input for REPL-style interaction.
 */

import * as readline from 'node:readline';
import { HarnessRunner, createHarnessRunner } from './HarnessRunner.js';
import { DEFAULT_CONFIG, type HarnessConfig, type Output } from './types.js';
import { ParseError } from './CommandParser.js';

// =============================================================================
// CLI Argument Parsing
// =============================================================================

interface CLIArgs {
  config: Partial<HarnessConfig>;
  help: boolean;
  interactive: boolean;
}

function parseArgs(args: string[]): CLIArgs {
  const result: CLIArgs = {
    config: {},
    help: false,
    interactive: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '--pretty':
        result.config.outputFormat = 'pretty';
        break;
      case '--json':
        result.config.outputFormat = 'json';
        break;
      case '--no-timestamps':
        result.config.includeTimestamps = false;
        break;
      case '--timestamps':
        result.config.includeTimestamps = true;
        break;
      case '--stop-on-error':
        result.config.stopOnError = true;
        break;
      case '--continue-on-error':
        result.config.stopOnError = false;
        break;
      case '--echo':
        result.config.echoCommands = true;
        break;
      case '--no-echo':
        result.config.echoCommands = false;
        break;
      case '--verbose':
      case '-v':
        result.config.verbose = true;
        break;
      case '--quiet':
      case '-q':
        result.config.verbose = false;
        break;
      case '--interactive':
      case '-i':
        result.interactive = true;
        break;
      case '--max-steps': {
        i++;
        const steps = Number(args[i]);
        if (!Number.isInteger(steps) || steps <= 0) {
          console.error('--max-steps requires a positive integer');
          process.exit(1);
        }
        result.config.maxStepsPerScript = steps;
        break;
      }
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        console.error(`Unknown option: ${arg}`);
        process.exit(1);
    }
  }

  return result;
}

// =============================================================================
// Output Formatting
// =============================================================================

function formatOutput(output: Output, config: HarnessConfig): string {
  if (config.outputFormat === 'json') {
    return JSON.stringify(output);
  }

  // Pretty format
  const prefix = config.includeTimestamps
    ? `[${new Date(output.timestamp).toISOString().slice(11, 23)}] `
    : '';

  switch (output.type) {
    case 'result':
      return `${prefix}${output.success ? 'OK' : 'FAIL'}${output.data !== undefined ? `: ${JSON.stringify(output.data)}` : ''}`;

    case 'focus': {
      const head = `${prefix}FOCUS: ${output.focused ?? 'none'}${output.changed ? ' (changed)' : ''}`;
      if (!output.scroll) return head;
      const { anchor, index, x, y } = output.scroll;
      return `${head}\n  scroll ${anchor} row ${index} -> (${x}, ${y})`;
    }

    case 'state':
      return `${prefix}STATE:\n  current: ${formatTriple(output.current)}\n  shadow:  ${formatTriple(output.shadow)}\n  range:   [${output.range.start}, ${output.range.end}]\n  window:  start=${output.window.windowStart} length=${output.window.windowLength} after=${output.window.rowsAfter}`;

    case 'error':
      return `${prefix}ERROR: ${output.message}`;

    case 'info':
      return `${prefix}INFO: ${output.message}`;

    case 'table':
      return `${prefix}TABLE:\n${formatTable(output.headers, output.rows)}`;

    case 'assert':
      return `${prefix}ASSERT ${output.passed ? 'PASSED' : 'FAILED'}: expected=${JSON.stringify(output.expected)}, actual=${JSON.stringify(output.actual)}${output.message ? ` (${output.message})` : ''}`;

    case 'echo':
      return `${prefix}ECHO: ${output.message}`;
  }
}

function formatTriple(triple: { key: string; id: number; index: number } | null): string {
  return triple ? `${triple.key} (id ${triple.id}, index ${triple.index})` : 'none';
}

function formatTable(headers: string[], rows: string[][]): string {
  const allRows = [headers, ...rows];
  const colWidths = headers.map((_, i) =>
    Math.max(...allRows.map((row) => (row[i] ?? '').length))
  );

  const separator = colWidths.map((w) => '-'.repeat(w + 2)).join('+');
  const formatRow = (row: string[]) =>
    row.map((cell, i) => ` ${cell.padEnd(colWidths[i] ?? 0)} `).join('|');

  return [
    formatRow(headers),
    separator,
    ...rows.map(formatRow),
  ].join('\n');
}

// =============================================================================
// Help Text
// =============================================================================

const HELP_TEXT = `
Row Focus Headless Harness

USAGE:
  npm run harness -- [options]
  npm run harness -- --pretty < session.txt
  echo "ROWS a b c" | npm run harness

OPTIONS:
  --pretty          Human-readable output (default: JSON)
  --json            JSON output (one object per line)
  --no-timestamps   Omit timestamps from output
  --stop-on-error   Stop execution on first error
  --echo            Echo commands before executing
  --verbose, -v     Verbose mode with extra logging
  --max-steps <n>   Maximum commands per piped script
  --interactive, -i Force interactive mode
  --help, -h        Show this help message

COMMANDS:
  Data:
    ROWS <key:data>...       Replace all rows
    SET <key> [data]         Insert or update a row
    REMOVE <key>             Remove a row
    SORT asc|desc|none       Order rows by key
    FILTER <prefix>          Keep rows whose key starts with prefix
    CLEAR_FILTER             Show all rows
    WINDOW <start> <length>  Materialize a window of rows

  Viewport:
    RANGE <start> <end>      Set the visible rows (inclusive)

  Focus:
    DOWN / UP                Move focus one row
    PAGE_DOWN / PAGE_UP      Move focus to the visible edge
    FOCUS <key>              Focus a row by key
    UNFOCUS                  Clear focus, remembering the row

  State Inspection:
    GET_FOCUS                Focused key
    STATE                    Focus model, range and window counters
    IN_RANGE                 Reconcile focus against the visible range
    DUMP                     Materialized rows as a table

  Assertions:
    ASSERT_FOCUS <key|none>  Assert the focused key
    ASSERT_ERROR             Expect next command to fail

  Utility & Control:
    ECHO <message>           Print message
    RESET                    Clear rows and focus
    QUIT                     Exit harness

EXAMPLES:
  ROWS k0:hello k1:there k4:world
  RANGE 0 2
  DOWN
  DOWN
  ASSERT_FOCUS k1
  REMOVE k1
  DOWN
  ASSERT_FOCUS k4
  ASSERT_ERROR
  REMOVE missing
`;

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const cliArgs = parseArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }

  const config: HarnessConfig = {
    ...DEFAULT_CONFIG,
    ...cliArgs.config,
  };

  const runner = createHarnessRunner(config, (output) => {
    console.log(formatOutput(output, config));
  });

  // Forward Ctrl+C to a running script
  process.on('SIGINT', () => {
    if (runner.isRunning()) {
      runner.abort('Interrupted');
    } else {
      process.exit(130);
    }
  });

  // Determine if interactive (TTY) or piped input
  const isInteractive = cliArgs.interactive || process.stdin.isTTY;

  if (isInteractive) {
    runInteractive(runner, config);
  } else {
    await runPiped(runner);
  }
}

function runInteractive(runner: HarnessRunner, config: HarnessConfig): void {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'focus> ',
  });

  if (config.verbose) {
    console.log('Row Focus Headless Harness');
    console.log('Type "help" for commands, "quit" to exit.');
    console.log('');
  }

  rl.prompt();

  rl.on('line', (line) => {
    if (line.trim().toLowerCase() === 'help') {
      console.log(HELP_TEXT);
      rl.prompt();
      return;
    }

    runner.executeLine(line).then(
      (shouldContinue) => {
        if (!shouldContinue) {
          rl.close();
          return;
        }
        rl.prompt();
      },
      (error: unknown) => {
        // Runtime errors are already printed by the runner
        if (error instanceof ParseError) {
          console.error(error.message);
        }
        if (config.stopOnError) {
          rl.close();
          process.exit(1);
        }
        rl.prompt();
      }
    );
  });

  rl.on('close', () => {
    if (config.verbose) {
      console.log('\nGoodbye!');
    }
    process.exit(0);
  });
}

async function runPiped(runner: HarnessRunner): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false,
  });

  const lines: string[] = [];

  // Collect all lines first
  for await (const line of rl) {
    lines.push(line);
  }

  const outputs = await runner.executeScript(lines.join('\n'));
  const failed = outputs.some(
    (output) => output.type === 'error' || (output.type === 'assert' && !output.passed)
  );
  process.exit(failed ? 1 : 0);
}

// Run
main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
