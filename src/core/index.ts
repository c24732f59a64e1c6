/**
 * Core dispatch module.
 * Registry of named targets plus the dispatcher that runs them.
 * No network, no CLI parsing.
 */

export {
  CommandRegistry,
  DuplicateNameError,
  RegistrySealedError,
  UnknownCommandError,
} from './registry.js';
export type {
  CommandAction,
  CommandEntry,
  CommandListing,
  ReadonlyRegistry,
} from './registry.js';
export { Dispatcher, HELP_COMMAND } from './dispatcher.js';
export type { DispatcherOptions } from './dispatcher.js';
export { runHelp, renderHelp, formatHelpLine, HELP_HEADER } from './help.js';
export type { OutputSink } from './help.js';
