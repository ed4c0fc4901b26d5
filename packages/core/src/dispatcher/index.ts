/**
 * @fileoverview Dispatcher exports
 */

export { CommandDispatcher, type CommandDispatcherOptions, type ExecuteArguments } from './dispatcher.js';
export { ParseResults } from './parse-results.js';
export { parseNodes } from './parser.js';
export { executeParsed, unparsedInputError, type ExecutionReport } from './executor.js';
export { getCompletionSuggestions, abortable, type CompletionOptions } from './completion.js';
export { UsageFormatter } from './usage.js';
