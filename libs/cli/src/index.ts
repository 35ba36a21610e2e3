/**
 * Slotwarden CLI library entry
 *
 * @packageDocumentation
 */

export { createProgram } from './cli';
export * from './commands/index';
export { openContext, engineFor, resolvePaths } from './utils/context';
export type { AppContext, ContextFactory, ContextOpener, ContextOptions, CliPaths } from './utils/context';
export { loadChainCatalog, parseChainCatalog, lookupChain, lookupMarket } from './utils/catalog';
export { EXIT } from './utils/exit';
