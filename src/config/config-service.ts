import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import Ajv, { SchemaObject } from 'ajv';
import { RoutingConfig, WEEKDAYS } from './types';
import { env } from './env';
import { ConfigError, toErrorMessage } from '../resilience/errors';
import { logger } from '../observability/logger';

// `useDefaults` fills `active`, `explicitChannelFields` and `referrerRules` in place
const ajv = new Ajv({ allErrors: true, useDefaults: true });

const TIME_PATTERN = '^([01]\\d|2[0-3]):[0-5]\\d$';

const windowSchema: SchemaObject = {
  anyOf: [
    { type: 'null' },
    {
      type: 'object',
      required: ['open', 'close'],
      properties: {
        open: { type: 'string', pattern: TIME_PATTERN },
        close: { type: 'string', pattern: TIME_PATTERN },
      },
      additionalProperties: false,
    },
  ],
};

const routingSchema: SchemaObject = {
  type: 'object',
  required: ['teams', 'channelToTeam', 'fallbackTeam', 'defaultChannel', 'businessHours'],
  properties: {
    teams: {
      type: 'object',
      minProperties: 1,
      additionalProperties: {
        type: 'array',
        items: {
          type: 'object',
          required: ['id', 'name'],
          properties: {
            id: { type: 'string', minLength: 1 },
            name: { type: 'string', minLength: 1 },
            active: { type: 'boolean', default: true },
          },
          additionalProperties: false,
        },
      },
    },
    channelToTeam: {
      type: 'object',
      additionalProperties: { type: 'string', minLength: 1 },
    },
    fallbackTeam: { type: 'string', minLength: 1 },
    defaultChannel: { type: 'string', minLength: 1 },
    explicitChannelFields: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
      default: ['channel_origin', 'source', 'utm_source'],
    },
    referrerRules: {
      type: 'array',
      default: [],
      items: {
        type: 'object',
        required: ['channel', 'keywords'],
        properties: {
          channel: { type: 'string', minLength: 1 },
          keywords: { type: 'array', minItems: 1, items: { type: 'string', minLength: 1 } },
        },
        additionalProperties: false,
      },
    },
    businessHours: {
      type: 'object',
      required: ['weekly'],
      properties: {
        timezone: { type: 'string', minLength: 1 },
        weekly: {
          type: 'object',
          properties: Object.fromEntries(WEEKDAYS.map((day) => [day, windowSchema])),
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const validateShape = ajv.compile<RoutingConfig>(routingSchema);

/**
 * Validate a parsed routing document. Collects every schema violation and
 * every dangling team/channel reference before failing.
 */
export function parseRoutingConfig(raw: unknown, source: string): RoutingConfig {
  if (!validateShape(raw)) {
    const problems = (validateShape.errors ?? []).map(
      (e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`,
    );
    throw new ConfigError(source, problems);
  }

  const problems: string[] = [];
  const teams = new Set(Object.keys(raw.teams));

  if (!teams.has(raw.fallbackTeam)) {
    problems.push(`fallbackTeam '${raw.fallbackTeam}' is not a defined team`);
  }
  for (const [channel, team] of Object.entries(raw.channelToTeam)) {
    if (!teams.has(team)) problems.push(`channelToTeam.${channel} points at unknown team '${team}'`);
  }
  for (const rule of raw.referrerRules) {
    if (!(rule.channel in raw.channelToTeam)) {
      problems.push(`referrerRules channel '${rule.channel}' is not mapped in channelToTeam`);
    }
  }
  for (const day of WEEKDAYS) {
    const hours = raw.businessHours.weekly[day];
    if (hours && hours.open >= hours.close) {
      problems.push(`businessHours.weekly.${day} opens at ${hours.open} but closes at ${hours.close}`);
    }
  }

  if (problems.length > 0) throw new ConfigError(source, problems);
  return raw;
}

export class ConfigService {
  private routingConfig: RoutingConfig;
  private readonly filePath: string;

  constructor(configPath: string = env.routing.configPath) {
    this.filePath = path.isAbsolute(configPath) ? configPath : path.resolve(env.projectRoot, configPath);
    this.routingConfig = this.load();
  }

  get routing(): RoutingConfig {
    return this.routingConfig;
  }

  /** Re-read the file; a broken file keeps nothing half-applied. */
  reload(): RoutingConfig {
    this.routingConfig = this.load();
    return this.routingConfig;
  }

  private load(): RoutingConfig {
    if (!fs.existsSync(this.filePath)) {
      logger.warn({ filepath: this.filePath }, 'Routing config not found; using built-in default');
      return ConfigService.builtInDefault();
    }

    let document: unknown;
    try {
      document = yaml.load(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(this.filePath, [toErrorMessage(err)]);
    }

    const config = parseRoutingConfig(document, this.filePath);
    logger.info(
      {
        filepath: this.filePath,
        teams: Object.keys(config.teams).length,
        channels: Object.keys(config.channelToTeam).length,
      },
      'Routing config loaded',
    );
    return config;
  }

  static builtInDefault(): RoutingConfig {
    const weekday = { open: '08:30', close: '17:00' };
    return {
      teams: {
        default: [],
      },
      channelToTeam: {
        whatsapp_direct: 'default',
      },
      fallbackTeam: 'default',
      defaultChannel: 'whatsapp_direct',
      explicitChannelFields: ['channel_origin', 'source', 'utm_source'],
      referrerRules: [],
      businessHours: {
        weekly: {
          monday: weekday,
          tuesday: weekday,
          wednesday: weekday,
          thursday: weekday,
          friday: weekday,
          saturday: { open: '08:30', close: '12:00' },
          sunday: null,
        },
      },
    };
  }
}
