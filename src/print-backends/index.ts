/**
 * @fileoverview Print backend implementations and their startup registration.
 */

import type { PrintBackendRegistry } from '../managers/PrintBackendRegistry';
import {
  PRINTNODE_IMPLEMENTATION_ID,
  PrintNodeBackend,
  PrintNodeBackendOptions
} from './PrintNodeBackend';

export { BasePrintBackend } from './BasePrintBackend';
export {
  PRINTNODE_IMPLEMENTATION_ID,
  PrintNodeBackend,
  buildPrintJobBody,
  parseExternalPrinterId,
  parsePrinters
} from './PrintNodeBackend';
export type { PrintJobBody, PrintNodeBackendOptions } from './PrintNodeBackend';

/**
 * Collaborators shared by the built-in backends
 */
export type BuiltInBackendDependencies = PrintNodeBackendOptions;

/**
 * Register every backend shipped with the application
 */
export function registerBuiltInBackends(
  registry: PrintBackendRegistry,
  dependencies: BuiltInBackendDependencies
): void {
  registry.register(PRINTNODE_IMPLEMENTATION_ID, () => new PrintNodeBackend(dependencies));
}
