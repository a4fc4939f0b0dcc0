import 'dotenv/config';

import { createApp } from './app';
import { loadConfig } from './config/appConfig';
import { getSupabaseAdmin } from './config/supabase';
import { createProductionServices } from './container';
import { runMaintenance } from './services/maintenance';
import { errorMessage } from './utils/errors';
import { ConsoleLogSink, Logger, SupabaseLogSink } from './utils/Logger';

const MAINTENANCE_INTERVAL_MS = 60 * 60 * 1000;

const config = loadConfig();
Logger.setLevel(config.logLevel);
Logger.useSinks(new ConsoleLogSink(), new SupabaseLogSink(getSupabaseAdmin(config)));

const services = createProductionServices(config);
const app = createApp(config, services);

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  Logger.logBackendError('Server', reason ?? new Error('Unhandled promise rejection'), {
    Endpoint: 'Process',
    Status: 'UNHANDLED_REJECTION',
  }).catch(() => {
    console.error('Unhandled rejection:', errorMessage(reason));
  });
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  Logger.logBackendError('Server', error, {
    Endpoint: 'Process',
    Status: 'UNCAUGHT_EXCEPTION',
  })
    .catch(() => {
      console.error('Uncaught exception:', error);
    })
    .finally(() => process.exit(1));
});

const maintenanceTimer = setInterval(() => {
  runMaintenance(services.maintenance).catch((err: unknown) =>
    Logger.logError('Maintenance', err, { Endpoint: 'Scheduler', Status: 'CLEANUP_FAILED' })
  );
}, MAINTENANCE_INTERVAL_MS);
maintenanceTimer.unref();

app.listen(config.port, async () => {
  console.log(`[api] listening on http://localhost:${config.port}`);
  await Logger.logInfo('Server', 'Server started', {
    Endpoint: 'Server',
    Status: 'STARTED',
    ResponsePayload: { port: config.port },
  });
});
