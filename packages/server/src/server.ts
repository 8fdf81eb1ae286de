import { once } from 'node:events';
import type { Server } from 'node:http';
import { promisify } from 'node:util';

import { type DeviceRegistryInstance, type Unsubscribe, createDeviceRegistry } from '@gpu-vitals/core';
import express, { type Express } from 'express';

import { env } from './env.js';
import { logger } from './logger.js';
import { createNotificationQueue } from './notificationQueue.js';
import { findAvailablePort } from './portUtils.js';
import { createRoutes } from './routes.js';
import { type SimulatedSourceInstance, createSimulatedSource } from './sampleSource.js';
import { type SettingsStoreInstance, createSettingsStore, loadSettingsFile } from './settingsStore.js';
import type { ServerConfig } from './types.js';

const NO_DEVICES = 0;

interface CloseServerParams {
  server: Server;
  source: SimulatedSourceInstance | null;
  unsubscribe: Unsubscribe;
}

type ServerCloseCallback = (err?: Error) => void;

export interface ServerInstance {
  app: Express;
  registry: DeviceRegistryInstance;
  settings: SettingsStoreInstance;
  port: number;
  close: () => Promise<void>;
}

const boundPort = (server: Server, requested: number): number => {
  const address = server.address();
  return typeof address === 'object' && address !== null ? address.port : requested;
};

export const createServer = async (config: ServerConfig = {}): Promise<ServerInstance> => {
  const {
    primaryPort = env.port,
    fallbackPort = env.fallbackPort,
    settingsPath = env.settingsPath,
    historyCapacity = env.historyCapacity,
    sampleIntervalMs = env.sampleIntervalMs,
    simulatedDevices = env.simulatedDevices,
    notificationMinIntervalMs = env.notificationMinIntervalMs,
    notifier,
  } = config;

  const port = await findAvailablePort([primaryPort, fallbackPort]);

  const settings = createSettingsStore(settingsPath === undefined ? {} : loadSettingsFile(settingsPath));
  const registry = createDeviceRegistry({
    historyCapacity,
    expectedIntervalMs: sampleIntervalMs,
    getSettings: () => settings.get(),
    onLog: (message, data) => logger.debug(message, data),
  });

  const notifications = createNotificationQueue({ minIntervalMs: notificationMinIntervalMs, notifier });
  const unsubscribe = registry.subscribe((transition) => {
    notifications.handle(transition);
  });

  const source =
    simulatedDevices > NO_DEVICES
      ? createSimulatedSource({ registry, deviceCount: simulatedDevices, intervalMs: sampleIntervalMs })
      : null;
  source?.start();

  const app = express();

  app.use(express.json());
  app.use('/api', createRoutes({ registry, settings }));

  const server = app.listen(port);
  await once(server, 'listening');
  const listeningPort = boundPort(server, port);
  logger.info(`Server running on http://localhost:${listeningPort}`);
  logger.info(`Ingest endpoint: POST http://localhost:${listeningPort}/api/devices/:deviceId/samples`);

  const close = createCloseHandler({ server, source, unsubscribe });

  return { app, registry, settings, port: listeningPort, close };
};

export const createCloseHandler = (params: CloseServerParams): (() => Promise<void>) => {
  const { server, source, unsubscribe } = params;

  return async (): Promise<void> => {
    source?.stop();
    unsubscribe();

    const closeAsync = promisify((callback: ServerCloseCallback) => {
      server.close(callback);
    });

    await closeAsync();
    logger.info('Server closed');
  };
};
