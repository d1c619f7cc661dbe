export {
  DecisionLog,
  DEFAULT_DECISION_LOG_CONFIG,
  type DecisionLogOptions,
  type DecisionLogStats,
} from './decision-log.js';
export { JsonlDecisionSink, MemoryDecisionSink } from './sinks.js';
export { DecisionLogEntrySchema, DecisionOutcomeSchema, DecisionRecordSchema } from './schema.js';
export type {
  DecisionLogConfig,
  DecisionLogEntry,
  DecisionOutcome,
  DecisionOutcomeInput,
  DecisionRecord,
  DecisionSink,
} from './types.js';
