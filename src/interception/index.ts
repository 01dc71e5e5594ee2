/**
 * Interception — Barrel Export
 */
export { interceptInstance, buildOverloadTable, selectOverload } from './interceptInstance.js';
export type { OverloadTable, InterceptOptions } from './interceptInstance.js';
export type { InvocationRecord, InvocationSink, InvocationOutcome } from './types.js';
