/**
 * @fileoverview Main entry point for the label dispatch server
 *
 * Key responsibilities:
 * - Initialize data directory, configuration and the catalog
 * - Apply command-line overrides
 * - Register the built-in print backends
 * - Start the print API server
 * - Handle graceful shutdown on SIGINT/SIGTERM
 */

import { getCatalogManager } from './managers/CatalogManager';
import { getConfigManager } from './managers/ConfigManager';
import { LabelHookManager } from './managers/LabelHookManager';
import { getPrintBackendRegistry } from './managers/PrintBackendRegistry';
import { TemplateManager } from './managers/TemplateManager';
import { registerBuiltInBackends } from './print-backends';
import { PrintApiServer } from './server/PrintApiServer';
import { LabelRenderService } from './services/LabelRenderService';
import { logError, logInfo, logWarning } from './utils/logging';
import { parseServerArguments, toConfigOverrides, validateServerArguments } from './utils/ServerArguments';
import { initializeDataDirectory } from './utils/setup';
import { createHardDeadline, withTimeout } from './utils/ShutdownTimeout';

const SHUTDOWN_STEP_TIMEOUT_MS = 5000;
const SHUTDOWN_DEADLINE_MS = 10000;

let apiServer: PrintApiServer | null = null;
let isShuttingDown = false;

/**
 * Stop the server and persist pending state
 */
async function shutdown(): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  const deadline = createHardDeadline(SHUTDOWN_DEADLINE_MS);
  logInfo('Shutdown', 'Stopping services...');

  try {
    if (apiServer) {
      await withTimeout(apiServer.stop(), { timeoutMs: SHUTDOWN_STEP_TIMEOUT_MS, operation: 'stop API server' });
    }
  } catch (error) {
    logError('Shutdown', 'Error stopping API server:', error);
  }

  try {
    await withTimeout(getConfigManager().dispose(), {
      timeoutMs: SHUTDOWN_STEP_TIMEOUT_MS,
      operation: 'save configuration'
    });
  } catch (error) {
    logError('Shutdown', 'Error saving configuration:', error);
  }

  clearTimeout(deadline);
  logInfo('Shutdown', 'Graceful shutdown complete');
}

function setupSignalHandlers(): void {
  const handle = (signal: NodeJS.Signals): void => {
    logInfo('Shutdown', `Received ${signal} signal`);
    shutdown()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError('Shutdown', 'Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', handle);
  process.on('SIGTERM', handle);
}

async function main(): Promise<void> {
  logInfo('Init', 'Label dispatch server starting');

  initializeDataDirectory();

  const args = parseServerArguments();
  const validation = validateServerArguments(args);
  if (!validation.valid) {
    logError('Init', 'Invalid command-line arguments:');
    validation.errors.forEach((error) => logError('Init', `  - ${error}`));
    process.exit(1);
  }

  const configManager = getConfigManager();
  const overrides = toConfigOverrides(args);
  const changedKeys = configManager.updateConfig(overrides);
  if (changedKeys.length > 0) {
    logInfo('Config', `Command-line overrides applied: ${changedKeys.join(', ')}`);
  }
  const config = configManager.getConfig();

  const catalog = getCatalogManager();
  if (catalog.listProviders().length === 0) {
    logWarning('Init', 'Catalog has no print providers configured');
  }

  const templateManager = TemplateManager.fromConfig(catalog, config);
  const registry = getPrintBackendRegistry();
  registerBuiltInBackends(registry, {
    templateManager,
    hookManager: new LabelHookManager([]),
    renderService: new LabelRenderService(),
    requestTimeoutMs: config.RequestTimeoutMs
  });
  logInfo('Init', `Print backends registered: ${registry.getRegisteredIds().join(', ')}`);

  apiServer = new PrintApiServer({ catalog, registry, templateManager }, config.ApiPort);
  await apiServer.start();

  setupSignalHandlers();
  logInfo('Ready', 'Press Ctrl+C to stop');
}

main().catch((error: unknown) => {
  logError('Fatal', 'Initialization failed:', error);
  process.exit(1);
});
