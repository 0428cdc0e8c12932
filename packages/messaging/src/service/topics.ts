
// Naming rule enforced by the push provider for topic names
const TOPIC_PATTERN = /^[a-zA-Z0-9\-_.~%]{1,900}$/;

export function isValidTopic(topic: string): boolean {
  return TOPIC_PATTERN.test(topic);
}

