/**
 * CLI module: a thin wrapper over the library.
 * Parses arguments, delegates, handles exit codes.
 * No business logic lives here.
 */

export { registerStartCommand, registerStatusCommand, registerSessionsCommand } from './commands.js';
