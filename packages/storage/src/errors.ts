export class StoreUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StoreUnavailableError";
  }
}

export class StoreQueryError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(`Query against the store failed: ${message}`, options);
    this.name = "StoreQueryError";
    this.code = code;
  }
}

export class NoDataForTickerError extends Error {
  readonly ticker: string;

  constructor(ticker: string) {
    super(`No data found for ticker ${ticker}`);
    this.name = "NoDataForTickerError";
    this.ticker = ticker;
  }
}

export class NoDataForDateError extends Error {
  readonly date: string;

  constructor(date: string) {
    super(`No data found for date ${date}`);
    this.name = "NoDataForDateError";
    this.date = date;
  }
}

export class InvalidDateError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid date format: ${value}. Please use YYYY-MM-DD.`);
    this.name = "InvalidDateError";
    this.value = value;
  }
}
