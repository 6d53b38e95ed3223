// zod schemas for the HTTP boundary.
export * from './schemas'
