/**
 * CLI module — thin wrapper over the library.
 * Parses arguments, delegates, handles exit codes.
 */

export { registerRunCommand, registerSetupCommand, registerEnvCommand } from './commands.js';
