export function stateTopic(topicPrefix: string, sensorId: string): string {
  return `${topicPrefix}/sensor/${sensorId}/state`;
}

export function attributesTopic(topicPrefix: string, sensorId: string): string {
  return `${topicPrefix}/sensor/${sensorId}/attributes`;
}

export function availabilityTopic(topicPrefix: string): string {
  return `${topicPrefix}/status`;
}

export function alertsTopic(topicPrefix: string): string {
  return `${topicPrefix}/alerts`;
}

export function discoveryTopic(discoveryPrefix: string, isBinary: boolean, uniqueId: string): string {
  const component = isBinary ? "binary_sensor" : "sensor";
  return `${discoveryPrefix}/${component}/${uniqueId}/config`;
}
