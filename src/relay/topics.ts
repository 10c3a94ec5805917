export type GateTopicKind = 'commands' | 'detection' | 'status' | 'heartbeat';

const TOPIC_PREFIX = 'gates';

export function gateTopic(gateId: string, kind: GateTopicKind): string {
  return `${TOPIC_PREFIX}/${gateId}/${kind}`;
}

export function allGatesTopic(kind: GateTopicKind): string {
  return `${TOPIC_PREFIX}/+/${kind}`;
}

export type ParsedGateTopic = {
  gateId: string;
  kind: GateTopicKind;
};

function isTopicKind(value: string): value is GateTopicKind {
  return value === 'commands' || value === 'detection' || value === 'status' || value === 'heartbeat';
}

export function parseGateTopic(topic: string): ParsedGateTopic | null {
  const parts = topic.split('/');
  if (parts.length !== 3 || parts[0] !== TOPIC_PREFIX || !parts[1]) {
    return null;
  }
  const kind = parts[2];
  if (!isTopicKind(kind)) {
    return null;
  }
  return { gateId: parts[1], kind };
}

/**
 * MQTT filter matching: `+` matches one level, a trailing `#` the rest.
 */
export function matchesTopic(filter: string, topic: string): boolean {
  const filterParts = filter.split('/');
  const topicParts = topic.split('/');

  for (let index = 0; index < filterParts.length; index += 1) {
    const part = filterParts[index];
    if (part === '#') {
      return index === filterParts.length - 1;
    }
    if (index >= topicParts.length) {
      return false;
    }
    if (part !== '+' && part !== topicParts[index]) {
      return false;
    }
  }

  return filterParts.length === topicParts.length;
}
