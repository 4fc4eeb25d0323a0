export class GrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnknownRuleNameError extends GrammarError {
  readonly ruleName: string;

  constructor(ruleName: string) {
    super(`Rule '${ruleName}' is referenced but not defined in the grammar`);
    this.ruleName = ruleName;
  }
}

export class DoubleBindError extends GrammarError {
  readonly slot: number;

  constructor(slot: number) {
    super(`Forward reference #${slot} is already bound`);
    this.slot = slot;
  }
}

export class UnboundReferenceError extends GrammarError {
  readonly slot: number;

  constructor(slot: number) {
    super(`Forward reference #${slot} has not been bound`);
    this.slot = slot;
  }
}

export class InvalidTerminalError extends GrammarError {
  readonly value: unknown;

  constructor(value: unknown) {
    super(`Terminal value must be a byte (0-255) or a single Latin-1 character, got ${JSON.stringify(value)}`);
    this.value = value;
  }
}
