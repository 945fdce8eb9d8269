import { z } from 'zod'
import { MonthlyAggregate, ProcedureAmountAggregate } from '../types/scanner'
import { DataUnavailableError } from './errors'

const MONTH_PATTERN = /^(\d{4})-(\d{2})(?:-\d{2}(?:[T ].*)?)?$/

const entityIdSchema = z.preprocess(
  (value) => (typeof value === 'number' ? String(value) : value),
  z.string().trim().min(1, 'Entity id is required')
)

// Blank cells must not coerce to 0
const blankToUndefined = (value: unknown) =>
  value === null || (typeof value === 'string' && value.trim() === '') ? undefined : value

const count = z.preprocess(blankToUndefined, z.coerce.number().int().min(0))
const amount = z.preprocess(blankToUndefined, z.coerce.number().finite())
const optionalCount = z.preprocess(blankToUndefined, z.coerce.number().int().min(0).optional())

export const calendarMonthSchema = z.union([z.string(), z.date()]).transform((value, ctx) => {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid date' })
      return z.NEVER
    }
    return `${value.getUTCFullYear()}-${String(value.getUTCMonth() + 1).padStart(2, '0')}`
  }

  const match = MONTH_PATTERN.exec(value.trim())
  const month = match ? Number(match[2]) : 0
  if (!match || month < 1 || month > 12) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid calendar month: ${value}` })
    return z.NEVER
  }
  return `${match[1]}-${match[2]}`
})

export const monthlyAggregateRowSchema = z
  .object({
    entity_id: entityIdSchema,
    period: calendarMonthSchema,
    claim_count: count,
    paid_amount: amount,
    beneficiary_count: optionalCount,
  })
  .transform((row): MonthlyAggregate => ({
    entityId: row.entity_id,
    period: row.period,
    claimCount: row.claim_count,
    paidAmount: row.paid_amount,
    ...(row.beneficiary_count !== undefined ? { beneficiaryCount: row.beneficiary_count } : {}),
  }))

export const procedureAmountRowSchema = z
  .object({
    entity_id: entityIdSchema,
    paid_amount: amount,
    row_count: count,
  })
  .transform((row): ProcedureAmountAggregate => ({
    entityId: row.entity_id,
    paidAmount: row.paid_amount,
    rowCount: row.row_count,
  }))

export const MONTHLY_AGGREGATE_COLUMNS = ['entity_id', 'period', 'claim_count', 'paid_amount'] as const
export const PROCEDURE_AMOUNT_COLUMNS = ['entity_id', 'paid_amount', 'row_count'] as const

type AggregateRecord = Readonly<Record<string, unknown>>

function parseTable<S extends z.ZodTypeAny>(
  table: string,
  records: readonly AggregateRecord[],
  columns: readonly string[],
  schema: S
): z.output<S>[] {
  if (records.length === 0) return []

  const missing = columns.filter((column) => !(column in records[0]))
  if (missing.length > 0) {
    throw new DataUnavailableError(
      `${table} table is missing required columns: ${missing.join(', ')}`,
      table,
      missing
    )
  }

  return records.map((record, index) => {
    const parsed = schema.safeParse(record)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new DataUnavailableError(
        `${table} row ${index + 1}: ${issue.path.join('.') || 'row'} ${issue.message}`,
        table
      )
    }
    return parsed.data
  })
}

/**
 * Validates upstream monthly records against the fixed schema. The monthly
 * table is required: absent input is fatal.
 */
export function parseMonthlyAggregate(
  records: readonly AggregateRecord[] | null | undefined
): MonthlyAggregate[] {
  if (!records) {
    throw new DataUnavailableError('MonthlyAggregate table is missing', 'MonthlyAggregate')
  }
  return parseTable('MonthlyAggregate', records, MONTHLY_AGGREGATE_COLUMNS, monthlyAggregateRowSchema)
}

// Absent procedure records only disable consistency detection
export function parseProcedureAmountAggregate(
  records: readonly AggregateRecord[] | null | undefined
): ProcedureAmountAggregate[] | undefined {
  if (!records) return undefined
  return parseTable('ProcedureAmountAggregate', records, PROCEDURE_AMOUNT_COLUMNS, procedureAmountRowSchema)
}
