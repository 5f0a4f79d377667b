import { AppContext } from './context.js';
import { requireDevice } from './config.js';
import { CaptureResult, DeviceSummary } from './types/smartthings.js';
import { AuthFailedError, errorMessage } from './types/errors.js';

export function formatCaptureResult(result: CaptureResult): string {
  if (result.ok) {
    return `✓ Capture complete: ${result.imagePath}`;
  }
  return `✗ Capture failed [${result.reason}]: ${result.message}`;
}

/**
 * Loads the token file and, when a device is configured, checks the access
 * token against it. A rejected token has already been refreshed once by the
 * API retry; the explicit refresh covers only checks that failed otherwise.
 */
export async function loadToken(ctx: AppContext): Promise<boolean> {
  const { tokens, api, config, log } = ctx;
  if (!await tokens.load()) {
    return false;
  }
  if (!config.deviceId) {
    return tokens.state === 'Authenticated';
  }

  log('Verifying access token validity...');
  let valid: boolean;
  try {
    valid = await api.validateToken(api.device(config.deviceId));
  } catch (error) {
    if (error instanceof AuthFailedError) {
      log(`✗ Token refresh failed: ${error.message}`);
      return false;
    }
    throw error;
  }
  if (valid) {
    log('✓ Access token is valid.');
    return true;
  }

  log('⚠️ Access token invalid. Attempting refresh...');
  try {
    await tokens.refresh();
    log('✓ Token refreshed and saved.');
    return true;
  } catch (error) {
    log(`✗ Token refresh failed: ${errorMessage(error)}`);
    return false;
  }
}

export async function listDevices(ctx: AppContext): Promise<DeviceSummary[]> {
  const devices = await ctx.api.listDevices();
  if (devices.length === 0) {
    ctx.log('No devices found.');
  }
  for (const device of devices) {
    ctx.log(`- ${device.label || device.name || 'Unnamed device'} (${device.deviceId})`);
  }
  return devices;
}

export async function showCapabilities(ctx: AppContext): Promise<string[]> {
  const deviceId = requireDevice(ctx.config);
  ctx.log(`Fetching capabilities for device ${deviceId}...`);
  const capabilities = await ctx.api.getCapabilities(ctx.api.device(deviceId));
  ctx.log('Device Capabilities:');
  for (const capability of capabilities) {
    ctx.log(`- ${capability.id}${capability.version !== undefined ? ` (v${capability.version})` : ''}`);
  }
  return capabilities.map(capability => capability.id);
}

export async function captureOnce(ctx: AppContext): Promise<CaptureResult> {
  const deviceId = requireDevice(ctx.config);
  const result = await ctx.capture.capture(ctx.api.device(deviceId));
  ctx.log(formatCaptureResult(result));
  return result;
}
