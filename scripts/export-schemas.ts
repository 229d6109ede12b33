/**
 * Exports all TypeBox schemas to JSON Schema files in schemas/.
 * Schemas with $id use that as filename; others use the export name.
 * Run via: npm run schemas
 */
import { writeFileSync, mkdirSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Kind } from '@sinclair/typebox'

import * as threat from '../src/threat/index.js'
import * as errors from '../src/errors/index.js'
import * as catalog from '../src/catalog/index.js'
import * as aggregation from '../src/aggregation/index.js'
import * as result from '../src/result/index.js'
import * as engine from '../src/engine/index.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const SCHEMAS_DIR = join(__dirname, '..', 'schemas')

const modules: Record<string, Record<string, unknown>> = {
  threat,
  errors,
  catalog,
  aggregation,
  result,
  engine,
}

export interface CollectedSchema {
  module: string
  id: string
  schema: Record<string, unknown>
}

function isSchema(value: unknown): value is Record<string | symbol, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && Kind in value
}

/** Every exported schema, keyed by module; constants and functions are skipped */
export function collectSchemas(): CollectedSchema[] {
  const collected: CollectedSchema[] = []
  for (const [moduleName, exports] of Object.entries(modules)) {
    for (const [exportName, schema] of Object.entries(exports)) {
      if (!isSchema(schema)) continue
      const id = typeof schema.$id === 'string' ? schema.$id : exportName
      collected.push({ module: moduleName, id, schema: { ...schema, $id: id } })
    }
  }
  return collected
}

export function writeSchemas(outDir: string = SCHEMAS_DIR): number {
  const schemas = collectSchemas()
  for (const { module, id, schema } of schemas) {
    const outPath = join(outDir, module, `${id}.json`)
    mkdirSync(dirname(outPath), { recursive: true })
    writeFileSync(outPath, JSON.stringify(schema, null, 2) + '\n')
  }
  return schemas.length
}

if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const count = writeSchemas()
  console.log(`[schemas] Exported ${count} schemas to ${SCHEMAS_DIR}`)
}
