/**
 * Main entry point for Azure Functions v4
 *
 * Importing the handler modules registers their HTTP functions on the shared
 * @azure/functions app object. Routes are served without the /api prefix
 * (see host.json).
 */

import { app } from '@azure/functions';

// Sentry should be initialized first to catch all errors
import { initializeSentry, flushSentry } from './lib/utils/sentry';
import { initializeTelemetry, flushTelemetry } from './lib/utils/telemetry';
import { validateConfig } from './types/config';

initializeSentry('api');
initializeTelemetry();
validateConfig();

// SSE endpoints return ReadableStream bodies
app.setup({ enableHttpStream: true });

app.hook.appTerminate(async () => {
  await Promise.all([flushTelemetry(), flushSentry()]);
});

// Import all function files to trigger their registration
import './healthCheck';
import './generateApi';
import './chatApi';
import './searchEndpoint';
import './ingestionApi';
