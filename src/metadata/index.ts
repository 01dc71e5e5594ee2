/**
 * Metadata — Barrel Export
 *
 * Builders for the load-time service side-table and the error raised
 * when a description is invalid.
 */
export { defineService, defineInterface, ServiceBuilder, MethodBuilder } from './defineService.js';
export { ServiceMetadataError } from './ServiceMetadataError.js';
export {
    TypeNameSchema, MemberNameSchema, ParameterTypeSchema,
    LogLevelSchema, MarkerSchema, MarkerListSchema, MemberSchema, ServiceDraftSchema,
} from './ServiceMetadataSchema.js';
