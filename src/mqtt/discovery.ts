import type { SensorDescriptor } from "../collector/types.js";
import { attributesTopic, availabilityTopic, stateTopic } from "./topics.js";

export interface DeviceInfo {
  identifiers: string[];
  name: string;
  model: string;
  manufacturer: string;
  sw_version: string;
  hw_version: string;
}

export interface DiscoveryPayload {
  name: string;
  unique_id: string;
  state_topic: string;
  availability_topic: string;
  device: DeviceInfo;
  device_class?: string;
  state_class?: string;
  unit_of_measurement?: string;
  icon?: string;
  entity_category?: string;
  suggested_display_precision?: number;
  json_attributes_topic?: string;
  payload_on?: string;
  payload_off?: string;
}

export interface DiscoveryContext {
  topicPrefix: string;
  uniqueIdPrefix: string;
  device: DeviceInfo;
}

export function uniqueIdFor(uniqueIdPrefix: string, sensorId: string): string {
  return `${uniqueIdPrefix}_${sensorId}`;
}

/**
 * Home Assistant discovery document for one sensor. Optional fields are
 * left out entirely when the descriptor does not set them.
 */
export function buildDiscoveryPayload(
  descriptor: SensorDescriptor,
  context: DiscoveryContext
): DiscoveryPayload {
  const payload: DiscoveryPayload = {
    name: descriptor.name,
    unique_id: uniqueIdFor(context.uniqueIdPrefix, descriptor.sensorId),
    state_topic: stateTopic(context.topicPrefix, descriptor.sensorId),
    availability_topic: availabilityTopic(context.topicPrefix),
    device: context.device,
  };

  if (descriptor.deviceClass) payload.device_class = descriptor.deviceClass;
  if (descriptor.stateClass) payload.state_class = descriptor.stateClass;
  if (descriptor.unit) payload.unit_of_measurement = descriptor.unit;
  if (descriptor.icon) payload.icon = descriptor.icon;
  if (descriptor.entityCategory) payload.entity_category = descriptor.entityCategory;
  if (descriptor.precision !== undefined) payload.suggested_display_precision = descriptor.precision;
  if (descriptor.hasAttributes) {
    payload.json_attributes_topic = attributesTopic(context.topicPrefix, descriptor.sensorId);
  }

  if (descriptor.isBinary) {
    payload.payload_on = "on";
    payload.payload_off = "off";
  }

  return payload;
}
