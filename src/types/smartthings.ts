export interface DeviceHandle {
  deviceId: string;
  apiBase: string;
}

export interface DeviceCommand {
  component: string;
  capability: string;
  command: string;
  arguments: unknown[];
}

export interface DeviceCommandRequest {
  commands: DeviceCommand[];
}

export interface DeviceSummary {
  deviceId: string;
  name?: string;
  label?: string;
}

export interface CapabilityReference {
  id: string;
  version?: number;
}

export interface DeviceCapabilities {
  deviceId: string;
  capabilities: CapabilityReference[];
}

export type CaptureFailureReason = 'CommandFailed' | 'NoImageAvailable' | 'DownloadFailed' | 'AuthFailed';

export type CaptureResult =
  | { ok: true; imagePath: string; imageUrl: string }
  | { ok: false; reason: CaptureFailureReason; message: string };

export interface PromptOutput {
  promptPath: string;
  base64Path: string;
}

export function buildCommandRequest(capability: string, command: string): DeviceCommandRequest {
  return {
    commands: [
      {
        component: 'main',
        capability,
        command,
        arguments: [],
      },
    ],
  };
}
