// ===== Zod Schemas and Validation =====
// Export all Zod schemas for runtime validation

export * from './validation'
export * from './schemas/track-schemas'
export * from './schemas/spotify-schemas'
export * from './schemas/external-api-schemas'
export * from './schemas/llm-response-schemas'
