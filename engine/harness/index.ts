/**
 * Row Focus Headless Harness - Module Exports
 *
 * A text-based harness for scripting focus sessions over the
 * stdin/stdout command protocol.
 */

export {
  CommandParser,
  createCommandParser,
  ParseError,
  parseRowSpec,
  parseCount,
} from './CommandParser.js';

export { HarnessRunner, createHarnessRunner } from './HarnessRunner.js';

export type {
  CommandType,
  ParsedCommand,
  OutputType,
  Output,
  OutputBase,
  ResultOutput,
  FocusOutput,
  StateOutput,
  TripleSnapshot,
  ErrorOutput,
  InfoOutput,
  TableOutput,
  AssertOutput,
  EchoOutput,
  HarnessConfig,
  StepLimitErrorOutput,
  AbortErrorOutput,
} from './types.js';

export { DEFAULT_CONFIG } from './types.js';
