export * from './bm25'
export * from './catalog'
export * from './classifier'
export * from './config'
export * from './errors'
export * from './extractor'
export * from './mapper'
export * from './tokenizer'
export * from './types'
