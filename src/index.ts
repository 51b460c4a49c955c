export * from './mapping'
export * from './enhance'
export { callLLM, DEFAULT_MODEL, type LLMCaller, type LLMOptions, type LLMResponse } from './llm'
export { configFromEnv, llmSettingsFromEnv } from './env'
export { runMappingPipeline, DEFAULT_BM25_TOP, DEFAULT_MAX_ENHANCED_CONTROLS, type PipelineOptions, type PipelineResult } from './pipeline'
