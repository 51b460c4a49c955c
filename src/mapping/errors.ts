/**
 * Error taxonomy of the control-mapping core.
 *
 * Every error carries a stable machine-readable code and a `details` record
 * naming the offending row, column or input so callers can report it as is.
 * The core never catches these; they surface to whoever invoked it.
 */

export const MappingErrorCode = {
  CATALOG_FORMAT: 'CATALOG_FORMAT',
  UNKNOWN_CONTROL: 'UNKNOWN_CONTROL',
  EMPTY_QUERY: 'EMPTY_QUERY',
  INVALID_CONFIG: 'INVALID_CONFIG'
} as const

export type MappingErrorCodeType = (typeof MappingErrorCode)[keyof typeof MappingErrorCode]

export class MappingError extends Error {
  public readonly code: MappingErrorCodeType
  public readonly details: Record<string, unknown>

  constructor(code: MappingErrorCodeType, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options)
    this.name = 'MappingError'
    this.code = code
    this.details = details
  }
}

/** Malformed or empty control catalog. */
export class CatalogFormatError extends MappingError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(MappingErrorCode.CATALOG_FORMAT, message, details, options)
    this.name = 'CatalogFormatError'
  }
}

/** A score was requested for a control id the index was not built with. */
export class UnknownControlError extends MappingError {
  public readonly controlId: string

  constructor(controlId: string) {
    super(MappingErrorCode.UNKNOWN_CONTROL, `Unknown control id: ${JSON.stringify(controlId)}`, { controlId })
    this.name = 'UnknownControlError'
    this.controlId = controlId
  }
}

export class EmptyQueryError extends MappingError {
  constructor(inputs: { serviceName: string; threatNote: string; documentText: string }) {
    super(
      MappingErrorCode.EMPTY_QUERY,
      'Query has no terms after normalization: service name, threat note and documentation text are all empty or stop words',
      {
        serviceName: inputs.serviceName,
        threatNote: inputs.threatNote,
        documentPreview: inputs.documentText.slice(0, 160)
      }
    )
    this.name = 'EmptyQueryError'
  }
}

export class MappingConfigError extends MappingError {
  constructor(message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(MappingErrorCode.INVALID_CONFIG, message, details, options)
    this.name = 'MappingConfigError'
  }
}

export function isMappingError(err: unknown): err is MappingError {
  return err instanceof MappingError
}
