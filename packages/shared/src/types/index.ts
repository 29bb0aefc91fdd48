export { EventEnvelopeSchema } from './events';
export type { EventEnvelope } from './events';
export type { BatchItemFailure, BatchReport } from './api';
