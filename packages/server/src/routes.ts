import type { Request, Response, Router } from 'express';
import { Router as createRouter } from 'express';

import { type DeviceRegistryInstance, isUnknownDeviceError } from '@gpu-vitals/core';

import {
  DEFAULT_ALERTS_LIMIT,
  HTTP_STATUS_ACCEPTED,
  HTTP_STATUS_BAD_REQUEST,
  HTTP_STATUS_INTERNAL_ERROR,
  HTTP_STATUS_NOT_FOUND,
  HTTP_STATUS_OK,
} from './constants.js';
import { historyToCsv } from './historyCsv.js';
import { logger } from './logger.js';
import type { SettingsStoreInstance } from './settingsStore.js';
import type { ErrorResponse, SampleAcceptedResponse, SettingsUpdatedResponse } from './types.js';
import { validateAlertsQuery, validateSampleRequest, validateThresholdsUpdate } from './validation.js';

interface RouteDependencies {
  registry: DeviceRegistryInstance;
  settings: SettingsStoreInstance;
}

type DeviceRequest = Request<{ deviceId: string }>;

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/** Unknown devices map to 404; anything else is a server fault */
const sendError = (res: Response, error: unknown): void => {
  if (isUnknownDeviceError(error)) {
    res.status(HTTP_STATUS_NOT_FOUND).json({ success: false, error: error.message });
    return;
  }
  logger.error('Request failed', { error: errorMessage(error) });
  res.status(HTTP_STATUS_INTERNAL_ERROR).json({ success: false, error: errorMessage(error) });
};

const createIngestHandler =
  ({ registry }: RouteDependencies) =>
  (req: DeviceRequest, res: Response<SampleAcceptedResponse | ErrorResponse>): void => {
    const validation = validateSampleRequest(req.body);

    if (!validation.valid) {
      res.status(HTTP_STATUS_BAD_REQUEST).json({
        success: false,
        error: validation.error,
      });
      return;
    }

    const { deviceId } = req.params;
    const { timestamp, ...metrics } = validation.data;
    try {
      const snapshot = registry.tick(deviceId, { ...metrics, timestamp: timestamp ?? Date.now() });
      res.status(HTTP_STATUS_ACCEPTED).json({
        success: true,
        deviceId,
        sequence: snapshot.sequence,
        healthScore: snapshot.healthScore,
        healthStatus: snapshot.healthStatus,
      });
    } catch (error) {
      sendError(res, error);
    }
  };

const createSelectHandler =
  ({ registry }: RouteDependencies) =>
  (req: DeviceRequest, res: Response): void => {
    try {
      registry.select(req.params.deviceId);
      res.status(HTTP_STATUS_OK).json({ success: true, selected: registry.getSelectedDevice() });
    } catch (error) {
      sendError(res, error);
    }
  };

const createSnapshotHandler =
  ({ registry }: RouteDependencies) =>
  (req: DeviceRequest, res: Response): void => {
    try {
      res.status(HTTP_STATUS_OK).json(registry.snapshot(req.params.deviceId));
    } catch (error) {
      sendError(res, error);
    }
  };

const createHistoryCsvHandler =
  ({ registry }: RouteDependencies) =>
  (req: DeviceRequest, res: Response): void => {
    try {
      const { deviceId } = req.params;
      const csv = historyToCsv(registry.history(deviceId));
      res
        .status(HTTP_STATUS_OK)
        .type('text/csv')
        .attachment(`${deviceId}-history.csv`)
        .send(csv);
    } catch (error) {
      sendError(res, error);
    }
  };

const createAlertsHandler =
  ({ registry }: RouteDependencies) =>
  (req: DeviceRequest, res: Response): void => {
    const validation = validateAlertsQuery(req.query);
    if (!validation.valid) {
      res.status(HTTP_STATUS_BAD_REQUEST).json({ success: false, error: validation.error });
      return;
    }
    try {
      const limit = validation.data.limit ?? DEFAULT_ALERTS_LIMIT;
      res.status(HTTP_STATUS_OK).json({ alerts: registry.getAlertHistory(req.params.deviceId, limit) });
    } catch (error) {
      sendError(res, error);
    }
  };

const createThresholdsHandler =
  ({ settings }: RouteDependencies) =>
  (req: Request, res: Response<SettingsUpdatedResponse | ErrorResponse>): void => {
    const validation = validateThresholdsUpdate(req.body);
    if (!validation.valid) {
      res.status(HTTP_STATUS_BAD_REQUEST).json({ success: false, error: validation.error });
      return;
    }
    try {
      res.status(HTTP_STATUS_OK).json({ success: true, settings: settings.updateThresholds(validation.data) });
    } catch (error) {
      // Merged settings failed validation, e.g. warn >= crit
      res.status(HTTP_STATUS_BAD_REQUEST).json({ success: false, error: errorMessage(error) });
    }
  };

export const createRoutes = (deps: RouteDependencies): Router => {
  const { registry, settings } = deps;
  const router = createRouter();

  router.get('/devices', (_req, res) => {
    res.status(HTTP_STATUS_OK).json({ devices: registry.listDevices(), selected: registry.getSelectedDevice() });
  });
  router.post('/devices/:deviceId/samples', createIngestHandler(deps));
  router.post('/devices/:deviceId/select', createSelectHandler(deps));
  router.get('/devices/:deviceId/snapshot', createSnapshotHandler(deps));
  router.get('/devices/:deviceId/history.csv', createHistoryCsvHandler(deps));
  router.get('/devices/:deviceId/alerts', createAlertsHandler(deps));
  router.get('/selected', (_req, res) => {
    res.status(HTTP_STATUS_OK).json(registry.viewSelected());
  });
  router.get('/settings', (_req, res) => {
    res.status(HTTP_STATUS_OK).json(settings.get());
  });
  router.put('/settings/thresholds', createThresholdsHandler(deps));

  return router;
};
