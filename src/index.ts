/**
 * Application Entry Point
 *
 * Starts the StressPilot HTTP server with Socket.IO push updates.
 *
 * @module index
 */

// Initialize OpenTelemetry FIRST - before any other imports
import './instrumentation';

import http from 'http';
import { Server as SocketServer } from 'socket.io';
import { createApp } from './app';
import { config, APP_NAME, APP_VERSION } from './config';
import { EventLogService } from './services/event-log.service';
import { HealthService } from './services/health.service';
import { LoadTestService } from './services/load-test.service';
import { RunTrackerService } from './services/run-tracker.service';
import { currentMetricsResponse } from './controllers/metrics.controller';
import { toStatusResponse } from './controllers/run-response';

/**
 * Bootstrap and start the application server.
 */
async function main(): Promise<void> {
  const app = createApp();
  const server = http.createServer(app);

  const io = new SocketServer(server, {
    cors: {
      origin: '*',
      methods: ['GET', 'POST'],
    },
    transports: ['websocket'],
    // Keep connections alive while the host is saturated
    pingTimeout: 60000,
    pingInterval: 25000,
  });

  EventLogService.setBroadcaster((event) => {
    io.emit('event', {
      id: event.id,
      timestamp: event.timestamp.toISOString(),
      level: event.level,
      event: event.event,
      message: event.message,
      runId: event.runId,
    });
  });

  RunTrackerService.setListener((status) => {
    io.emit('status', toStatusResponse(status));
  });

  io.on('connection', (socket) => {
    console.log(`[Socket.IO] Client connected: ${socket.id}`);
    socket.emit('status', toStatusResponse(RunTrackerService.currentStatus()));

    socket.on('disconnect', (reason) => {
      console.log(`[Socket.IO] Client disconnected: ${socket.id} (${reason})`);
    });
  });

  const metricsTimer = setInterval(() => {
    io.emit('metrics', currentMetricsResponse());
  }, config.metricsIntervalMs);

  const probe = HealthService.probeStressor();
  if (probe.available) {
    EventLogService.info('STRESSOR_AVAILABLE', `Stressor found at ${probe.resolvedPath ?? probe.command}`);
  } else {
    EventLogService.warn('STRESSOR_MISSING', probe.reason ?? `${probe.command} is unavailable`, {
      details: { command: probe.command },
    });
  }

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    EventLogService.info('SERVER_STOPPING', `Received ${signal}, shutting down`);
    clearInterval(metricsTimer);
    LoadTestService.stopActive();
    io.close();
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.port, config.host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  // Use process.stdout.write so container log collectors see the line unbuffered
  process.stdout.write(`[${APP_NAME}] Server running on http://${config.host}:${config.port}\n`);
  EventLogService.info('SERVER_STARTED', `${APP_NAME} ${APP_VERSION} started on port ${config.port}`, {
    details: { port: config.port, host: config.host, stressor: config.stressorCommand },
  });
}

main().catch((error: Error) => {
  console.error(`[${APP_NAME}] Failed to start server:`, error.message);
  process.exit(1);
});
