/**
 * =============================================================================
 * OPENTELEMETRY INSTRUMENTATION: Application Performance Monitoring
 * =============================================================================
 *
 * PURPOSE:
 *   Enables Azure Monitor OpenTelemetry (tracing of incoming HTTP requests
 *   and Express routes) when a connection string is configured.
 *
 * LOAD ORDER:
 *   Must be imported before any other application code so the SDK can patch
 *   http and express before they are loaded. index.ts imports it first.
 *
 * CONFIGURATION:
 *   - APPLICATIONINSIGHTS_CONNECTION_STRING set   → telemetry enabled
 *   - unset (local runs, tests)                   → telemetry disabled,
 *                                                   nothing else changes
 *
 * @module instrumentation
 */

import { useAzureMonitor, AzureMonitorOpenTelemetryOptions } from '@azure/monitor-opentelemetry';

const options: AzureMonitorOpenTelemetryOptions = {
  // Connection string is read from APPLICATIONINSIGHTS_CONNECTION_STRING
  azureMonitorExporterOptions: {},
  instrumentationOptions: {
    http: { enabled: true },
  },
};

/**
 * Starts telemetry if a connection string is present.
 *
 * @returns Whether telemetry was enabled
 */
export function initTelemetry(connectionString: string | undefined = process.env.APPLICATIONINSIGHTS_CONNECTION_STRING): boolean {
  if (!connectionString) {
    console.log('[StressPilot] APPLICATIONINSIGHTS_CONNECTION_STRING not set - telemetry disabled');
    return false;
  }

  console.log('[StressPilot] Initializing Azure Monitor OpenTelemetry...');
  useAzureMonitor(options);
  console.log('[StressPilot] Azure Monitor OpenTelemetry initialized');
  return true;
}

initTelemetry();
