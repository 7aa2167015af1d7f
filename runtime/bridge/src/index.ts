/**
 * @tether/bridge
 *
 * The bridge's query handling, exported for embedding and tests.
 * `main.ts` is the process entry point.
 */

export { BridgeSession, type BridgeSessionDeps, type RunQuery } from './core/bridge-session.js';
export { parseCommand, type ParsedCommand } from './core/command-parser.js';
export { SdkTranslator, toResultEvent } from './core/sdk-translator.js';
export { summarizeInput } from './core/summarize-input.js';
export { buildQueryOptions, buildSystemPrompt, resolveWorkingDirectory } from './core/query-options.js';
