declare namespace NodeJS {
  interface ProcessEnv {
    DEV_LOG?: string
    CTRL_MAPPER_DEBUG?: string
    CTRL_MAPPER_ID_COLUMN?: string
    CTRL_MAPPER_DESCRIPTION_COLUMN?: string
    CTRL_MAPPER_K1?: string
    CTRL_MAPPER_B?: string
    CTRL_MAPPER_HIGH?: string
    CTRL_MAPPER_MEDIUM?: string
    CTRL_MAPPER_PATTERNS?: string
    LLM_ENDPOINT?: string
    LLM_MODEL?: string
  }
}
