/** Errors surfaced to callers of the registry. */
import type { DeviceId } from './types.js';

/**
 * Raised when selecting or reading a device that has not produced a sample yet.
 * Recoverable: the caller may retry once the device reports.
 */
export class UnknownDeviceError extends Error {
  readonly code = 'UNKNOWN_DEVICE';
  readonly deviceId: DeviceId;

  constructor(deviceId: DeviceId) {
    super(`Unknown device '${deviceId}': no sample has been received for it yet`);
    this.name = 'UnknownDeviceError';
    this.deviceId = deviceId;
  }
}

export const isUnknownDeviceError = (error: unknown): error is UnknownDeviceError =>
  error instanceof UnknownDeviceError;
