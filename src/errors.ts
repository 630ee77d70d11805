export type ErrorCode = 'not_found' | 'malformed_identifier' | 'invalid_parameter'

export class DashboardError extends Error {
  code: ErrorCode
  context?: Record<string, unknown>

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = 'DashboardError'
    this.code = code
    this.context = context
  }
}

/**
 * A caller asked for an entity (issue, user, media source) that the loaded
 * data does not contain. Distinct from "exists but has no data".
 */
export class NotFoundError extends DashboardError {
  entity: string
  id: string

  constructor(entity: string, id: string) {
    super('not_found', `${entity} '${id}' not found`, { entity, id })
    this.name = 'NotFoundError'
    this.entity = entity
    this.id = id
  }
}

export class MalformedIdentifierError extends DashboardError {
  constructor(value: unknown) {
    super('malformed_identifier', `Malformed identifier: ${JSON.stringify(value) ?? String(value)}`)
    this.name = 'MalformedIdentifierError'
  }
}

export class InvalidParameterError extends DashboardError {
  parameter: string

  constructor(parameter: string, message: string) {
    super('invalid_parameter', message, { parameter })
    this.name = 'InvalidParameterError'
    this.parameter = parameter
  }
}
