import Redis from 'ioredis';
import { env } from './config/env';
import { ConfigService } from './config/config-service';
import { RoutingConfig } from './config/types';
import { logger } from './observability/logger';
import { enableDefaultMetrics } from './observability/metrics';
import { PhoneNormalizer } from './identity/phone-normalizer';
import { CoordinationStore } from './store/types';
import { createCoordinationStore } from './store/coordination-store';
import { SessionKeyspace } from './session/session-keyspace';
import { ConversationStateStore } from './session/conversation-state-store';
import { HandoffCoordinator } from './orchestrator/handoff-coordinator';
import { MessageAggregator } from './aggregation/message-aggregator';
import { TimerDrainScheduler } from './aggregation/drain-scheduler';
import { DrainScheduler } from './aggregation/types';
import { LeadRoundRobinAssigner } from './routing/lead-assigner';
import { OrphanLeadAlerts } from './routing/orphan-alerts';
import { AppointmentScheduleIndex } from './scheduling/appointment-index';
import { AppointmentReminderScheduler } from './scheduling/reminder-scheduler';
import { BusinessHours } from './scheduling/business-hours';
import { AppointmentNotifier } from './scheduling/types';
import { ConversationPipeline, PipelineMessages } from './pipeline/conversation-pipeline';
import { AlertChannel, AssistantService, CrmClient, ReplySink } from './pipeline/types';

const HOUR_MS = 60 * 60 * 1000;

/** Services that live outside this core */
export interface CoreCollaborators {
  assistant: AssistantService;
  crm?: CrmClient;
  alerts?: AlertChannel;
  replySink?: ReplySink;
  /** Enables the reminder scheduler */
  notifier?: AppointmentNotifier;
}

export interface CoreOptions {
  /** Use this store instead of connecting (tests, embedding) */
  store?: CoordinationStore;
  /** Use this client instead of REDIS_URL; the caller keeps ownership */
  redis?: Redis;
  routing?: RoutingConfig;
  drainScheduler?: DrainScheduler;
  messages?: Partial<PipelineMessages>;
  startReminderScheduler?: boolean;
  collectDefaultMetrics?: boolean;
  now?: () => number;
}

export interface CoreContext {
  store: CoordinationStore;
  keyspace: SessionKeyspace;
  normalizer: PhoneNormalizer;
  state: ConversationStateStore;
  coordinator: HandoffCoordinator;
  aggregator: MessageAggregator;
  drainScheduler: DrainScheduler;
  assigner: LeadRoundRobinAssigner;
  orphanAlerts: OrphanLeadAlerts;
  appointments: AppointmentScheduleIndex;
  businessHours: BusinessHours;
  pipeline: ConversationPipeline;
  reminderScheduler?: AppointmentReminderScheduler;
  close(): Promise<void>;
}

/** Connects to REDIS_URL; undefined when unset or unreachable. */
export async function connectRedis(url: string = env.redis.url): Promise<Redis | undefined> {
  if (!url) {
    logger.warn('REDIS_URL not set; coordination state is process-local');
    return undefined;
  }

  const redisInstance = new Redis(url, {
    maxRetriesPerRequest: 3,
    connectTimeout: env.redis.connectTimeoutMs,
    retryStrategy(times) {
      if (times > 5) return null; // stop retrying
      return Math.min(times * 200, 2000);
    },
    lazyConnect: true,
  });
  // Attach error handler BEFORE connect to prevent unhandled error events
  redisInstance.on('error', (err) => {
    logger.debug({ err: err.message }, 'Redis connection error (handled)');
  });

  try {
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    redisInstance.disconnect();
    return undefined;
  }
}

/**
 * Wire every component around one coordination store handle. The returned
 * context owns that handle (unless it was passed in) and the schedulers.
 */
export async function buildCore(collaborators: CoreCollaborators, options: CoreOptions = {}): Promise<CoreContext> {
  if (options.collectDefaultMetrics) enableDefaultMetrics();

  let ownsStore = false;
  let store = options.store;
  if (!store) {
    const redis = options.redis ?? (await connectRedis());
    store = createCoordinationStore(redis);
    ownsStore = options.redis === undefined;
  }

  const now = options.now ?? Date.now;
  const routing = options.routing ?? new ConfigService().routing;
  const keyspace = new SessionKeyspace(env.redis.keyPrefix, env.session.legacyFallbackEnabled);
  const normalizer = new PhoneNormalizer({ countryCode: env.identity.defaultCountryCode });

  const state = new ConversationStateStore(store, keyspace, {
    defaultTtlSeconds: env.session.defaultTtlSeconds,
    now,
  });
  const coordinator = new HandoffCoordinator(state, {
    timings: {
      humanActiveTtlSeconds: env.session.humanActiveTtlHours * 60 * 60,
      clientTimeoutMs: env.session.clientTimeoutHours * HOUR_MS,
      advisorTimeoutMs: env.session.advisorTimeoutHours * HOUR_MS,
    },
    now,
  });

  const drainScheduler = options.drainScheduler ?? new TimerDrainScheduler();
  const aggregator = new MessageAggregator(store, keyspace, drainScheduler, {
    enabled: env.aggregation.enabled,
    windowSeconds: env.aggregation.windowSeconds,
    separator: env.aggregation.separator,
    now,
  });

  const assigner = new LeadRoundRobinAssigner(store, keyspace, routing);
  const orphanAlerts = new OrphanLeadAlerts(store, keyspace, collaborators.alerts);
  const businessHours = new BusinessHours(routing.businessHours, env.routing.timezone);
  const appointments = new AppointmentScheduleIndex(store, keyspace, { ttlDays: env.appointments.ttlDays, now });

  const pipeline = new ConversationPipeline({
    normalizer,
    state,
    coordinator,
    aggregator,
    assigner,
    orphanAlerts,
    businessHours,
    assistant: collaborators.assistant,
    crm: collaborators.crm,
    alerts: collaborators.alerts,
    replySink: collaborators.replySink,
    messages: options.messages,
    now,
  });
  drainScheduler.onDrain(async (session) => {
    await pipeline.processDeferred(session);
  });

  let reminderScheduler: AppointmentReminderScheduler | undefined;
  if (collaborators.notifier && env.appointments.schedulerEnabled) {
    reminderScheduler = new AppointmentReminderScheduler(
      appointments,
      collaborators.notifier,
      env.appointments.reminderIntervalMinutes * 60 * 1000,
    );
    if (options.startReminderScheduler ?? true) reminderScheduler.start();
  }

  const coreStore = store;
  logger.info(
    {
      store: coreStore.kind,
      aggregationWindowSeconds: env.aggregation.windowSeconds,
      teams: Object.keys(routing.teams).length,
      reminders: reminderScheduler !== undefined,
    },
    'Handoff core ready',
  );

  return {
    store: coreStore,
    keyspace,
    normalizer,
    state,
    coordinator,
    aggregator,
    drainScheduler,
    assigner,
    orphanAlerts,
    appointments,
    businessHours,
    pipeline,
    reminderScheduler,
    async close() {
      reminderScheduler?.stop();
      drainScheduler.stop();
      if (ownsStore) await coreStore.close();
      logger.info('Handoff core closed');
    },
  };
}
