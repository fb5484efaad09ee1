import { object, optional, picklist, pipe, regex, string, transform, url } from 'valibot'
import type { InferOutput } from 'valibot'
import { LOG_LEVELS } from './logging'

export const decimalSchema = pipe(string(), regex(/^\d+$/, 'expected a decimal integer'))
export const hex32Schema = pipe(string(), regex(/^(0x)?[0-9a-fA-F]{64}$/, 'expected 32 bytes of hex'))
export const addressSchema = pipe(string(), regex(/^0x[0-9a-fA-F]{40}$/, 'expected a 0x-prefixed 20-byte address'))

/* ── Tendermint RPC GET /commit ── */
export const commitResponseSchema = object({
  result: object({
    signed_header: object({
      header: object({ height: decimalSchema }),
      commit: object({
        block_id: object({ hash: hex32Schema }),
      }),
    }),
  }),
})

export type CommitResponse = InferOutput<typeof commitResponseSchema>

/* ── process environment ── */
const flagSchema = pipe(
  picklist(['true', 'false', '1', '0']),
  transform((s) => s === 'true' || s === '1'),
)

export const envSchema = object({
  LOG_LEVEL: optional(picklist(LOG_LEVELS), 'info'),
  LOG_PRETTY: optional(flagSchema, 'false'),
  MAX_SKIP_SPAN: optional(decimalSchema, '512'),
  GATEWAY_ADDRESS: optional(addressSchema),
  ADMIN_ADDRESS: optional(addressSchema),
  GENESIS_POLICY: optional(picklist(['once', 'repeatable']), 'once'),
  STATE_FILE: optional(string()),
  TENDERMINT_RPC_URL: optional(pipe(string(), url('expected an RPC url'))),
  RELAYER_INTERVAL_MS: optional(decimalSchema, '1800000'),
  RELAYER_CONFIRMATIONS: optional(decimalSchema, '10'),
})

export type Env = InferOutput<typeof envSchema>
