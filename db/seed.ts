import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { PoolClient } from 'pg'
import { getConfig } from '../src/lib/config'
import { createPool } from '../src/features/rules/pgRepository'
import {
  toCurrentParkingRule,
  toLegacyParkingRule,
  toSanitaryProfile,
  toUseSanitaryProfile,
  toUseType,
  toZoneRule,
} from '../src/features/rules/schemas'

const here = path.dirname(fileURLToPath(import.meta.url))

// ---------------------------------------------------------------------------
// Tables, in insertion order (foreign keys point backwards)
// ---------------------------------------------------------------------------
interface TableSpec {
  name: string
  key: string[]
  columns: string[]
  /** Same converter the repository uses, so a bad seed fails before it lands */
  validate: (row: unknown) => unknown
}

const TABLES: TableSpec[] = [
  {
    name: 'use_types',
    key: ['code'],
    columns: ['code', 'label', 'category', 'is_active'],
    validate: toUseType,
  },
  {
    name: 'zone_rules',
    key: ['zone_sigla', 'use_type_code'],
    columns: [
      'zone_sigla', 'use_type_code',
      'to_max', 'tp_min', 'ia_min', 'ia_max', 'to_sub_max',
      'recuo_frontal_m', 'recuo_lateral_m', 'recuo_fundos_m',
      'gabarito_m', 'gabarito_pav',
      'area_min_lote_m2', 'area_max_lote_m2',
      'testada_min_meio_m', 'testada_min_esquina_m', 'testada_max_m',
      'allow_attach_one_side', 'notes', 'special_area_tag',
      'observacoes', 'source_ref', 'requires_subzone', 'subzone_code',
    ],
    validate: toZoneRule,
  },
  {
    name: 'parking_rules_v2',
    key: ['use_code'],
    columns: ['use_code', 'base_metric', 'rule_json', 'general_notes', 'source_ref', 'notes'],
    validate: toCurrentParkingRule,
  },
  {
    name: 'parking_rules',
    key: ['use_type_code'],
    columns: ['use_type_code', 'metric', 'value', 'min_vagas', 'source_ref', 'rule_json'],
    validate: toLegacyParkingRule,
  },
  {
    name: 'sanitary_profiles',
    key: ['sanitary_profile'],
    columns: ['sanitary_profile', 'title', 'rule_json', 'source_ref', 'notes'],
    validate: toSanitaryProfile,
  },
  {
    name: 'use_sanitary_profile',
    key: ['use_type_code'],
    columns: ['use_type_code', 'sanitary_profile', 'notes'],
    validate: toUseSanitaryProfile,
  },
]

const SeedFileSchema = z.record(z.array(z.record(z.unknown())))

// pg would send a JS array as a Postgres array literal; jsonb wants JSON text
function toParam(value: unknown): unknown {
  if (value === undefined) return null
  if (value !== null && typeof value === 'object') return JSON.stringify(value)
  return value
}

async function upsertRows(client: PoolClient, table: TableSpec, rows: Record<string, unknown>[]) {
  const placeholders = table.columns.map((_, i) => `$${i + 1}`).join(', ')
  const updates = table.columns
    .filter((c) => !table.key.includes(c))
    .map((c) => `${c} = EXCLUDED.${c}`)
    .join(', ')
  const sql =
    `INSERT INTO ${table.name} (${table.columns.join(', ')}) VALUES (${placeholders}) ` +
    `ON CONFLICT (${table.key.join(', ')}) DO UPDATE SET ${updates}`

  for (const row of rows) {
    table.validate(row)
    await client.query(sql, table.columns.map((c) => toParam(row[c])))
  }
}

async function main() {
  const config = getConfig()
  const pool = createPool(config)
  const client = await pool.connect()

  try {
    const schemaSql = fs.readFileSync(path.join(here, 'schema.sql'), 'utf-8')
    const seed = SeedFileSchema.parse(
      JSON.parse(fs.readFileSync(path.join(here, 'seed-rules.json'), 'utf-8')),
    )

    console.log('Seeding rule store...')
    await client.query('BEGIN')
    await client.query(schemaSql)

    for (const table of TABLES) {
      const rows = seed[table.name] ?? []
      await upsertRows(client, table, rows)
      console.log(`  ${table.name.padEnd(22)} ${rows.length}`)
    }

    await client.query('COMMIT')
    console.log('Seed completed successfully!')
  } catch (e) {
    await client.query('ROLLBACK')
    throw e
  } finally {
    client.release()
    await pool.end()
  }
}

main().catch((e) => {
  console.error(e)
  process.exit(1)
})
