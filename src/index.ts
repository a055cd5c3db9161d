export * from './analytics/index.js'
export * from './ingest/index.js'
export * from './subcategories/index.js'
