export { buildCore, connectRedis } from './app';
export type { CoreCollaborators, CoreContext, CoreOptions } from './app';

export { env } from './config/env';
export { ConfigService, parseRoutingConfig } from './config/config-service';
export type { OwnerConfig, RoutingConfig, BusinessHoursConfig, Weekday } from './config/types';

export { PhoneNormalizer, normalizeIdentity, isValidIdentity, DEFAULT_NUMBERING_PLAN } from './identity/phone-normalizer';
export type { IdentityResult, IdentityErrorKind, NumberingPlan } from './identity/types';

export type { CoordinationStore } from './store/types';
export { RedisCoordinationStore, InMemoryCoordinationStore, createCoordinationStore } from './store/coordination-store';

export { SessionKeyspace } from './session/session-keyspace';
export { ConversationStateStore, migrateMeta } from './session/conversation-state-store';
export type { ContactHints, ConversationStatus, ConversationMeta, SessionRef } from './session/types';

export { HandoffCoordinator } from './orchestrator/handoff-coordinator';
export { HandoffStateMachine, handoffStateMachine } from './orchestrator/state-machine';
export type { TimeoutSignal, TimeoutCheck, HandoffTimings } from './orchestrator/types';

export { MessageAggregator } from './aggregation/message-aggregator';
export { TimerDrainScheduler } from './aggregation/drain-scheduler';
export type { AggregationDecision, DrainScheduler, DrainedBatch } from './aggregation/types';

export { LeadRoundRobinAssigner } from './routing/lead-assigner';
export { OrphanLeadAlerts } from './routing/orphan-alerts';
export type { AssignmentResult, AssignmentStats } from './routing/types';

export { AppointmentScheduleIndex, migrateAppointment } from './scheduling/appointment-index';
export { AppointmentReminderScheduler } from './scheduling/reminder-scheduler';
export { BusinessHours, formatClock } from './scheduling/business-hours';
export type { Appointment, AppointmentStatus, AppointmentNotifier, NextOpening } from './scheduling/types';

export { ConversationPipeline, DEFAULT_PIPELINE_MESSAGES } from './pipeline/conversation-pipeline';
export type {
  AssistantService,
  AssistantSignal,
  AssistantReply,
  CrmClient,
  AlertChannel,
  ReplySink,
  InboundEvent,
  InboundResult,
  ProcessOutcome,
  HandoffPriority,
} from './pipeline/types';

export { ValidationError, StoreUnavailableError, ConfigError, toErrorMessage } from './resilience/errors';
export { logger } from './observability/logger';
export { registry as metricsRegistry } from './observability/metrics';
export { createTraceContext } from './observability/trace';
export type { TraceContext } from './observability/trace';
