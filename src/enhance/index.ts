export * from './keywordOverlap'
export * from './llmEnhancer'
export * from './merge'
export * from './prompt'
export * from './select'
export * from './types'
