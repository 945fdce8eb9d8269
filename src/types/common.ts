export type EntityId = string;

/** Calendar month in `YYYY-MM` form. */
export type CalendarMonth = string;

export type MoneyDollars = number;
