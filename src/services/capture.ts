import path from 'path';
import { format } from 'date-fns';
import { SmartThingsApi } from './smartthings.js';
import { isSuccess } from './http.js';
import { writePrompt } from './output.js';
import { CaptureFailureReason, CaptureResult, DeviceHandle } from '../types/smartthings.js';
import { AuthFailedError, errorMessage } from '../types/errors.js';

export interface CaptureOptions {
  captureDir: string;
  settleDelayMs?: number;
  writePrompt?: boolean;
  prompt?: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  log?: (line: string) => void;
}

const IMAGE_URL_PATTERN = /https:\/\/[^\s"'<>]+/;

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Drives one remote capture: refresh command, take command, status poll,
 * image download. Holds no state between calls.
 */
export class CaptureController {
  private api: SmartThingsApi;
  private captureDir: string;
  private settleDelayMs: number;
  private shouldWritePrompt: boolean;
  private prompt?: string;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;
  private log: (line: string) => void;

  constructor(api: SmartThingsApi, options: CaptureOptions) {
    this.api = api;
    this.captureDir = options.captureDir;
    this.settleDelayMs = options.settleDelayMs ?? 3000;
    this.shouldWritePrompt = options.writePrompt ?? true;
    this.prompt = options.prompt;
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? console.log;
  }

  async capture(device: DeviceHandle): Promise<CaptureResult> {
    try {
      await this.api.ensureToken();
    } catch (error) {
      return this.fail('AuthFailed', errorMessage(error));
    }

    this.log('Sending refresh command...');
    try {
      const refresh = await this.api.sendCommand(device, 'Refresh', 'refresh');
      if (!isSuccess(refresh.status)) {
        this.log(`⚠️ Refresh command failed (HTTP ${refresh.status}), continuing`);
      }
    } catch (error) {
      this.log(`⚠️ Refresh command failed: ${errorMessage(error)}, continuing`);
    }

    await this.sleep(this.settleDelayMs);

    this.log('Sending image capture command...');
    try {
      const take = await this.api.sendCommand(device, 'imageCapture', 'take');
      if (!isSuccess(take.status)) {
        return this.fail('CommandFailed', `Capture command failed (HTTP ${take.status})`);
      }
    } catch (error) {
      return this.failFrom(error, 'CommandFailed', 'Capture command failed');
    }

    await this.sleep(this.settleDelayMs);

    this.log('Fetching device status...');
    let imageUrl: string | null;
    try {
      const status = await this.api.getStatus(device);
      if (!isSuccess(status.status)) {
        return this.fail('CommandFailed', `Failed to fetch device status (HTTP ${status.status})`);
      }
      imageUrl = findImageUrl(status.data);
    } catch (error) {
      return this.failFrom(error, 'CommandFailed', 'Failed to fetch device status');
    }

    if (!imageUrl) {
      return this.fail('NoImageAvailable', 'No image URL found in status.');
    }

    const imagePath = path.join(this.captureDir, `capture_${format(this.now(), 'yyyyMMdd_HHmmss_SSS')}.jpg`);
    this.log('Downloading captured image...');
    try {
      await this.api.download(imageUrl, imagePath);
    } catch (error) {
      return this.failFrom(error, 'DownloadFailed', 'Failed to download image');
    }

    this.log(`✓ Image saved at: ${imagePath}`);
    if (this.shouldWritePrompt) {
      try {
        const output = await writePrompt(imagePath, this.prompt);
        this.log(`✓ Prompt file written: ${output.promptPath}`);
      } catch (error) {
        this.log(`⚠️ Failed to write prompt file: ${errorMessage(error)}`);
      }
    }

    return { ok: true, imagePath, imageUrl };
  }

  private failFrom(error: unknown, reason: CaptureFailureReason, context: string): CaptureResult {
    if (error instanceof AuthFailedError) {
      return this.fail('AuthFailed', error.message);
    }
    return this.fail(reason, `${context}: ${errorMessage(error)}`);
  }

  private fail(reason: CaptureFailureReason, message: string): CaptureResult {
    this.log(`✗ ${message}`);
    return { ok: false, reason, message };
  }
}

/**
 * Returns the first https URL found under an attribute whose name mentions
 * "image", walking the status document depth-first in key order.
 */
export function findImageUrl(data: unknown, underImage = false): string | null {
  if (typeof data === 'string') {
    if (!underImage) {
      return null;
    }
    const match = IMAGE_URL_PATTERN.exec(data);
    return match ? match[0] : null;
  }
  if (Array.isArray(data)) {
    for (const item of data) {
      const found = findImageUrl(item, underImage);
      if (found) {
        return found;
      }
    }
    return null;
  }
  if (typeof data === 'object' && data !== null) {
    for (const [key, value] of Object.entries(data)) {
      const found = findImageUrl(value, underImage || /image/i.test(key));
      if (found) {
        return found;
      }
    }
  }
  return null;
}
