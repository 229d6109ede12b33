import { Type, Static } from '@sinclair/typebox'

export const GovernanceErrorCode = Type.Union([
  Type.Literal('CATALOG_INVALID'),
  Type.Literal('CONFIG_INVALID'),
  Type.Literal('INPUT_INVALID'),
  Type.Literal('INTERNAL_ERROR'),
], { $id: 'GovernanceErrorCode', description: 'Failure category of a rejected evaluation' })

export type GovernanceErrorCode = Static<typeof GovernanceErrorCode>

export const GovernanceErrorPayload = Type.Object({
  code: GovernanceErrorCode,
  message: Type.String({ minLength: 1 }),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
}, { $id: 'GovernanceErrorPayload', description: 'Serializable form of a configuration or contract failure.' })

export type GovernanceErrorPayload = Static<typeof GovernanceErrorPayload>
