import type { HassDeviceInfo } from "./utility.mts";

export const DEVICE_INFO_DOMAIN = "mqtt";

export type DeviceInfoConfig = {
  identifiers: string[];
  connections: [string, string][];
  manufacturer?: string;
  model?: string;
  name?: string;
  sw_version?: string;
};

/**
 * Holds the `device` block of the entity config, renders it in the registry format
 */
export class DeviceInfoHolder {
  constructor(private config: DeviceInfoConfig | undefined) {}

  update(config: DeviceInfoConfig | undefined): void {
    this.config = config;
  }

  get device_info(): HassDeviceInfo | undefined {
    if (!this.config) {
      return undefined;
    }
    const { identifiers, connections, manufacturer, model, name, sw_version } = this.config;
    const out: HassDeviceInfo = {
      connections: connections.map(([type, value]) => [type, value]),
      identifiers: identifiers.map(id => [DEVICE_INFO_DOMAIN, id]),
    };
    if (manufacturer !== undefined) {
      out.manufacturer = manufacturer;
    }
    if (model !== undefined) {
      out.model = model;
    }
    if (name !== undefined) {
      out.name = name;
    }
    if (sw_version !== undefined) {
      out.sw_version = sw_version;
    }
    return out;
  }
}
