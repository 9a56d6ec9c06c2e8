/**
 * CLI Commands index
 */

export { registerCoreCommands, loadSession } from './core.js';
