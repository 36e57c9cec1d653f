export const TOPIC_ENTRY = "parking/events/entry";
export const TOPIC_EXIT = "parking/events/exit";
export const TOPIC_SCAN = "parking/events/scan";
export const TOPIC_SYSTEM = "parking/system";
export const TOPIC_COMMANDS = "parking/commands";

export const deviceTopics = [TOPIC_ENTRY, TOPIC_EXIT, TOPIC_SCAN, TOPIC_SYSTEM] as const;
export type DeviceTopic = (typeof deviceTopics)[number];

export function isDeviceTopic(topic: string): topic is DeviceTopic {
  return deviceTopics.some((t) => t === topic);
}
