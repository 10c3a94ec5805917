import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import type { InferenceEngineConfig } from '../detection/engines.js';
import type { ActuatorConfig } from '../gate/actuator.js';
import type { BrokerConfig } from '../relay/mqttTransport.js';
import type { RuleConfig } from '../rules/engine.js';
import type { TunnelConfig, TunnelTimingOptions } from '../tunnel/supervisor.js';
import type { GateState } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type GateConfig = {
  id: string;
  initialState?: GateState;
  actuator: ActuatorConfig;
};

export type AlertsConfig = {
  capacity: number;
};

export type EngineConfig = InferenceEngineConfig;

export type DetectionConfig = {
  minConfidence: number;
  failureBackoffMs: number;
  engine: EngineConfig;
};

export type RelayConfig = {
  broker: BrokerConfig;
  detectionUrl?: string | null;
  timeoutMs: number;
  heartbeatIntervalMs: number;
};

export type TunnelSettings = TunnelConfig &
  TunnelTimingOptions & {
    enabled: boolean;
    autoStart: boolean;
  };

export type ServerConfig = {
  host: string;
  port: number;
};

export type DashboardConfig = ServerConfig & {
  defaultGateId: string;
  gateTimeoutMs: number;
  commandTimeoutMs: number;
  broker: BrokerConfig;
  database: {
    path: string;
  };
};

export type GatewardenConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  gate: GateConfig;
  rules: RuleConfig[];
  alerts: AlertsConfig;
  detection: DetectionConfig;
  relay: RelayConfig;
  tunnel: TunnelSettings;
  server: ServerConfig;
  dashboard: DashboardConfig;
};

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.join('; '));
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

type JsonType = 'object' | 'number' | 'integer' | 'string' | 'boolean' | 'array' | 'null';

type JsonSchema = {
  type: JsonType | JsonType[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  items?: JsonSchema;
  enum?: (string | number | boolean)[];
  minimum?: number;
  maximum?: number;
  minLength?: number;
};

const nonEmptyString: JsonSchema = { type: 'string', minLength: 1 };
const positiveInteger: JsonSchema = { type: 'integer', minimum: 1 };
const nonNegativeInteger: JsonSchema = { type: 'integer', minimum: 0 };
const portSchema: JsonSchema = { type: 'integer', minimum: 0, maximum: 65535 };

const brokerSchema: JsonSchema = {
  type: 'object',
  required: ['url', 'clientId', 'connectTimeoutMs', 'reconnectPeriodMs'],
  additionalProperties: false,
  properties: {
    url: nonEmptyString,
    clientId: nonEmptyString,
    username: { type: 'string' },
    password: { type: 'string' },
    connectTimeoutMs: positiveInteger,
    reconnectPeriodMs: nonNegativeInteger
  }
};

const commandSchema: JsonSchema = { type: 'array', items: nonEmptyString };

const gatewardenConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'gate', 'rules', 'alerts', 'detection', 'relay', 'tunnel', 'server', 'dashboard'],
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      properties: { name: nonEmptyString }
    },
    logging: {
      type: 'object',
      required: ['level'],
      properties: {
        level: { type: 'string', enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] }
      }
    },
    gate: {
      type: 'object',
      required: ['id', 'actuator'],
      additionalProperties: false,
      properties: {
        id: nonEmptyString,
        initialState: { type: 'string', enum: ['OPEN', 'CLOSED'] },
        actuator: {
          type: 'object',
          required: ['type'],
          additionalProperties: false,
          properties: {
            type: { type: 'string', enum: ['simulated', 'command'] },
            latencyMs: nonNegativeInteger,
            openCommand: commandSchema,
            closeCommand: commandSchema,
            timeoutMs: positiveInteger
          }
        }
      }
    },
    rules: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'triggerLabels', 'action'],
        additionalProperties: false,
        properties: {
          id: nonEmptyString,
          triggerLabels: { type: 'array', items: { type: 'string' } },
          action: { type: 'string', enum: ['OPEN', 'CLOSE'] }
        }
      }
    },
    alerts: {
      type: 'object',
      required: ['capacity'],
      properties: { capacity: positiveInteger }
    },
    detection: {
      type: 'object',
      required: ['minConfidence', 'failureBackoffMs', 'engine'],
      additionalProperties: false,
      properties: {
        minConfidence: { type: 'number', minimum: 0, maximum: 1 },
        failureBackoffMs: nonNegativeInteger,
        engine: {
          type: 'object',
          required: ['type'],
          additionalProperties: false,
          properties: {
            type: { type: 'string', enum: ['replay', 'process'] },
            file: nonEmptyString,
            intervalMs: nonNegativeInteger,
            loop: { type: 'boolean' },
            command: nonEmptyString,
            args: { type: 'array', items: { type: 'string' } }
          }
        }
      }
    },
    relay: {
      type: 'object',
      required: ['broker', 'timeoutMs', 'heartbeatIntervalMs'],
      additionalProperties: false,
      properties: {
        broker: brokerSchema,
        detectionUrl: { type: ['string', 'null'] },
        timeoutMs: positiveInteger,
        heartbeatIntervalMs: nonNegativeInteger
      }
    },
    tunnel: {
      type: 'object',
      required: [
        'enabled',
        'autoStart',
        'host',
        'user',
        'port',
        'keyPath',
        'remotePort',
        'localPort',
        'healthyAfterMs',
        'restartDelayMs',
        'restartMaxDelayMs',
        'restartJitterFactor',
        'forceKillTimeoutMs'
      ],
      additionalProperties: false,
      properties: {
        enabled: { type: 'boolean' },
        autoStart: { type: 'boolean' },
        host: nonEmptyString,
        user: nonEmptyString,
        port: { type: 'integer', minimum: 1, maximum: 65535 },
        keyPath: nonEmptyString,
        remotePort: { type: 'integer', minimum: 1, maximum: 65535 },
        localPort: { type: 'integer', minimum: 1, maximum: 65535 },
        command: nonEmptyString,
        extraOptions: { type: 'array', items: nonEmptyString },
        healthyAfterMs: positiveInteger,
        restartDelayMs: positiveInteger,
        restartMaxDelayMs: positiveInteger,
        restartJitterFactor: { type: 'number', minimum: 0, maximum: 1 },
        forceKillTimeoutMs: positiveInteger
      }
    },
    server: {
      type: 'object',
      required: ['host', 'port'],
      properties: { host: nonEmptyString, port: portSchema }
    },
    dashboard: {
      type: 'object',
      required: ['host', 'port', 'defaultGateId', 'gateTimeoutMs', 'commandTimeoutMs', 'broker', 'database'],
      additionalProperties: false,
      properties: {
        host: nonEmptyString,
        port: portSchema,
        defaultGateId: nonEmptyString,
        gateTimeoutMs: positiveInteger,
        commandTimeoutMs: positiveInteger,
        broker: brokerSchema,
        database: {
          type: 'object',
          required: ['path'],
          properties: { path: nonEmptyString }
        }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const types = Array.isArray(schema.type) ? schema.type : [schema.type];
  const results = types.map(type => validateAgainstSchemaForType(type, schema, value, pathLabel));

  if (results.some(errors => errors.length === 0)) {
    return [];
  }

  return results[0] ?? [];
}

function validateAgainstSchemaForType(
  type: JsonType,
  schema: JsonSchema,
  value: unknown,
  pathLabel: string
): string[] {
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    const definedProperties = new Set(Object.keys(schema.properties ?? {}));
    const additional = schema.additionalProperties;
    if (additional === false) {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    } else if (typeof additional === 'object') {
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(...validateAgainstSchema(additional, value[key], `${pathLabel}.${key}`));
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (key in value) {
        errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
      }
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const items = schema.items;
    if (items) {
      value.forEach((item: unknown, index) => {
        errors.push(...validateAgainstSchema(items, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number' || type === 'integer') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (type === 'integer' && !Number.isInteger(value)) {
      errors.push(`${pathLabel} must be an integer`);
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (typeof schema.minLength === 'number' && value.trim().length < schema.minLength) {
      errors.push(`${pathLabel} must not be empty`);
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }

    return errors;
  }

  if (type === 'boolean') {
    if (typeof value !== 'boolean') {
      errors.push(`${pathLabel} must be a boolean`);
    }
    return errors;
  }

  if (value !== null) {
    errors.push(`${pathLabel} must be null`);
  }
  return errors;
}

function assertMatchesSchema(value: unknown): asserts value is GatewardenConfig {
  const errors = validateAgainstSchema(gatewardenConfigSchema, value, 'config');
  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
}

export function validateConfig(value: unknown): asserts value is GatewardenConfig {
  assertMatchesSchema(value);
  validateLogicalConfig(value);
}

export function parseConfig(contents: string): GatewardenConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigValidationError([`Failed to parse configuration: ${message}`]);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): GatewardenConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * The merged `config/` directory for the current NODE_ENV, validated.
 */
export function loadRuntimeConfig(): GatewardenConfig {
  const loaded: unknown = config.util.toObject(config);
  validateConfig(loaded);
  return loaded;
}

function validateLogicalConfig(value: GatewardenConfig) {
  const messages: string[] = [];

  const seenRuleIds = new Set<string>();
  value.rules.forEach((rule, index) => {
    const label = rule.id || `#${index}`;
    if (seenRuleIds.has(rule.id)) {
      messages.push(`config.rules[${label}] duplicates rule id "${rule.id}"`);
    }
    seenRuleIds.add(rule.id);

    const labels = rule.triggerLabels.map(entry => entry.trim()).filter(entry => entry.length > 0);
    if (labels.length === 0) {
      messages.push(`config.rules[${label}] must have at least one non-empty trigger label`);
    }
  });

  const actuator = value.gate.actuator;
  if (actuator.type === 'command') {
    if (!Array.isArray(actuator.openCommand) || actuator.openCommand.length === 0) {
      messages.push('config.gate.actuator.openCommand is required for command actuators');
    }
    if (!Array.isArray(actuator.closeCommand) || actuator.closeCommand.length === 0) {
      messages.push('config.gate.actuator.closeCommand is required for command actuators');
    }
  }

  const engine = value.detection.engine;
  if (engine.type === 'replay' && typeof engine.file !== 'string') {
    messages.push('config.detection.engine.file is required for replay engines');
  }
  if (engine.type === 'process' && typeof engine.command !== 'string') {
    messages.push('config.detection.engine.command is required for process engines');
  }

  if (value.tunnel.restartMaxDelayMs < value.tunnel.restartDelayMs) {
    messages.push('config.tunnel.restartMaxDelayMs must be >= config.tunnel.restartDelayMs');
  }

  if (value.relay.detectionUrl) {
    try {
      const url = new URL(value.relay.detectionUrl);
      if (url.protocol !== 'http:' && url.protocol !== 'https:') {
        messages.push('config.relay.detectionUrl must use http or https');
      }
    } catch {
      messages.push('config.relay.detectionUrl must be a valid URL');
    }
  }

  if (messages.length > 0) {
    throw new ConfigValidationError(messages);
  }
}

export { gatewardenConfigSchema };
