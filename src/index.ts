export * from './lib/detect';
export * from './lib/profile';
export * from './lib/formatters';
export {
  parseMonthlyAggregate,
  parseProcedureAmountAggregate,
  calendarMonthSchema,
  monthlyAggregateRowSchema,
  procedureAmountRowSchema,
  MONTHLY_AGGREGATE_COLUMNS,
  PROCEDURE_AMOUNT_COLUMNS
} from './lib/validations';
export { DataUnavailableError, UnknownEntityError, UnknownDetectionRuleError, ScanConfigError } from './lib/errors';
export type * from './types/scanner';
export type * from './types/common';
