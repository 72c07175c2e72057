import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

let defaultsCollected = false;

/** Opt-in process metrics; the entrypoint calls this once. */
export function enableDefaultMetrics(): void {
  if (defaultsCollected) return;
  collectDefaultMetrics({ register: registry, prefix: 'handoff_' });
  defaultsCollected = true;
}

// ───── Handoff state machine ─────

export const stateTransitions = new Counter({
  name: 'handoff_state_transitions_total',
  help: 'Conversation status transitions',
  labelNames: ['from', 'to'] as const,
  registers: [registry],
});

export const timeoutSignals = new Counter({
  name: 'handoff_timeout_signals_total',
  help: 'Timeout signals raised for operator-owned conversations',
  labelNames: ['signal'] as const,
  registers: [registry],
});

export const legacyKeyHits = new Counter({
  name: 'handoff_legacy_key_hits_total',
  help: 'Reads served from a channel-less legacy key',
  labelNames: ['kind'] as const,
  registers: [registry],
});

// ───── Lead assignment ─────

export const leadAssignments = new Counter({
  name: 'handoff_lead_assignments_total',
  help: 'Round-robin owner resolutions',
  labelNames: ['team', 'outcome'] as const,
  registers: [registry],
});

export const orphanLeads = new Counter({
  name: 'handoff_orphan_leads_total',
  help: 'Leads that could not be assigned to an active owner',
  registers: [registry],
});

// ───── Aggregation ─────

export const aggregationDecisions = new Counter({
  name: 'handoff_aggregation_decisions_total',
  help: 'Inbound buffering decisions',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const aggregatedBatchSize = new Histogram({
  name: 'handoff_aggregated_batch_size',
  help: 'Number of messages combined per drained buffer',
  buckets: [1, 2, 3, 5, 8, 13],
  registers: [registry],
});

// ───── Appointments ─────

export const appointmentDispatches = new Counter({
  name: 'handoff_appointment_dispatches_total',
  help: 'Reminder and follow-up dispatches',
  labelNames: ['kind', 'status'] as const,
  registers: [registry],
});

// ───── Store ─────

export const storeErrors = new Counter({
  name: 'handoff_store_errors_total',
  help: 'Coordination store transport failures',
  labelNames: ['operation'] as const,
  registers: [registry],
});

export const pipelineDuration = new Histogram({
  name: 'handoff_pipeline_duration_seconds',
  help: 'Time spent processing one aggregated unit of work',
  labelNames: ['responder'] as const,
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});
