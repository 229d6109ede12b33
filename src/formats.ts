/**
 * Registers the string formats used by the contract schemas.
 * TypeBox ships no format validators, so `Value.Check` rejects any
 * `format` it does not know until this module has been imported.
 */
import { FormatRegistry } from '@sinclair/typebox'

const DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i
const SEMVER = /^\d+\.\d+\.\d+(-[0-9A-Za-z.-]+)?$/

if (!FormatRegistry.Has('date-time')) {
  FormatRegistry.Set('date-time', (value) => DATE_TIME.test(value) && !Number.isNaN(Date.parse(value)))
}

if (!FormatRegistry.Has('semver')) {
  FormatRegistry.Set('semver', (value) => SEMVER.test(value))
}
