/** Base class for input problems the caller is expected to recover from. */
export class LedgerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidAmountError extends LedgerError {
  constructor(readonly input: string) {
    super(`Invalid amount: ${JSON.stringify(input)}`);
  }
}

export class InvalidDateError extends LedgerError {
  constructor(readonly input: string) {
    super(`Invalid date: ${JSON.stringify(input)}`);
  }
}
