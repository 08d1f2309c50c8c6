/**
 * Row Focus Headless Harness - Command Parser
 *
 * Parses text commands into structured command objects.
 *
 * Command syntax:
 *   COMMAND [args...]
 *
 * Data:
 *   ROWS k0:hello k1:there k4:world        - Replace all rows (key:data)
 *   SET k2 "more data"                     - Insert or update one row
 *   REMOVE k1                              - Remove a row
 *   SORT asc|desc|none                     - Order rows by key
 *   FILTER k                               - Keep keys starting with prefix
 *   CLEAR_FILTER                           - Drop the filter
 *   WINDOW 10 50                           - Materialize 50 rows from index 10
 *
 * Viewport:
 *   RANGE 0 20                             - Visible logical rows (inclusive)
 *
 * Focus:
 *   DOWN / UP / PAGE_UP / PAGE_DOWN / UNFOCUS
 *   FOCUS k4                               - Focus a key
 *
 * State Inspection:
 *   GET_FOCUS / STATE / IN_RANGE / DUMP
 *
 * Assertions:
 *   ASSERT_FOCUS k1 | ASSERT_FOCUS none
 *   ASSERT_ERROR                           - Next command must fail
 */

import type { CommandType, ParsedCommand } from './types.js';

// =============================================================================
// Row Spec Utilities
// =============================================================================

/**
 * Parse a `key:data` row spec. A bare key gets its own name as data.
 */
export function parseRowSpec(spec: string): { key: string; data: string } | null {
  const sep = spec.indexOf(':');
  const key = sep === -1 ? spec : spec.substring(0, sep);
  if (key === '') return null;
  const data = sep === -1 ? key : spec.substring(sep + 1);
  return { key, data };
}

/**
 * Parse a non-negative integer argument.
 */
export function parseCount(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value)) return null;
  return parseInt(value, 10);
}

// =============================================================================
// Command Parser
// =============================================================================

const COMMAND_TYPES: readonly CommandType[] = [
  // Data
  'ROWS', 'SET', 'REMOVE', 'SORT', 'FILTER', 'CLEAR_FILTER', 'WINDOW',
  // Viewport
  'RANGE',
  // Focus
  'DOWN', 'UP', 'PAGE_UP', 'PAGE_DOWN', 'UNFOCUS', 'FOCUS',
  // State inspection
  'GET_FOCUS', 'STATE', 'IN_RANGE', 'DUMP',
  // Assertions
  'ASSERT_FOCUS', 'ASSERT_ERROR',
  // Utility
  'ECHO',
  // Control
  'RESET', 'QUIT',
];

const VALID_COMMANDS: ReadonlySet<string> = new Set(COMMAND_TYPES);

function isCommandType(value: string): value is CommandType {
  return VALID_COMMANDS.has(value);
}

export class CommandParser {
  /**
   * Parse a single command line.
   */
  parse(line: string, lineNumber: number = 0): ParsedCommand | null {
    const trimmed = line.trim();

    // Skip empty lines and comments
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith('//')) {
      return null;
    }

    // Tokenize the line
    const tokens = this.tokenize(trimmed, lineNumber);
    if (tokens.length === 0) return null;

    // First token is the command
    const commandStr = (tokens[0] ?? '').toUpperCase();

    if (!isCommandType(commandStr)) {
      throw new ParseError(`Unknown command: ${commandStr}`, lineNumber, trimmed);
    }

    return {
      type: commandStr,
      args: tokens.slice(1),
      raw: trimmed,
      lineNumber,
    };
  }

  /**
   * Parse multiple lines.
   */
  parseLines(lines: string[]): ParsedCommand[] {
    const commands: ParsedCommand[] = [];

    for (let i = 0; i < lines.length; i++) {
      const cmd = this.parse(lines[i] ?? '', i + 1);
      if (cmd) {
        commands.push(cmd);
      }
    }

    return commands;
  }

  /**
   * Parse a script (multiline string).
   */
  parseScript(script: string): ParsedCommand[] {
    return this.parseLines(script.split('\n'));
  }

  /**
   * Tokenize a command line, respecting quoted strings.
   */
  private tokenize(line: string, lineNumber: number): string[] {
    const tokens: string[] = [];
    let current = '';
    let inQuotes = false;
    let quoteChar = '';

    for (let i = 0; i < line.length; i++) {
      const char = line.charAt(i);

      if (inQuotes) {
        if (char === quoteChar) {
          // End of quoted string
          tokens.push(current);
          current = '';
          inQuotes = false;
          quoteChar = '';
        } else if (char === '\\' && i + 1 < line.length) {
          // Escape sequence
          const next = line.charAt(i + 1);
          if (next === quoteChar || next === '\\' || next === 'n' || next === 't') {
            if (next === 'n') current += '\n';
            else if (next === 't') current += '\t';
            else current += next;
            i++;
          } else {
            current += char;
          }
        } else {
          current += char;
        }
      } else {
        if (char === '"' || char === "'") {
          // Start of quoted string
          if (current !== '') {
            tokens.push(current);
            current = '';
          }
          inQuotes = true;
          quoteChar = char;
        } else if (char === ' ' || char === '\t') {
          // Whitespace separator
          if (current !== '') {
            tokens.push(current);
            current = '';
          }
        } else {
          current += char;
        }
      }
    }

    // Don't forget the last token
    if (current !== '') {
      tokens.push(current);
    }

    if (inQuotes) {
      throw new ParseError('Unterminated string', lineNumber, line);
    }

    return tokens;
  }
}

// =============================================================================
// Parse Error
// =============================================================================

export class ParseError extends Error {
  lineNumber: number;
  line: string;

  constructor(message: string, lineNumber: number, line: string) {
    super(`Parse error at line ${lineNumber}: ${message}\n  ${line}`);
    this.name = 'ParseError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCommandParser(): CommandParser {
  return new CommandParser();
}
