// shared/src/errors.ts

export type ConversionErrorCode =
  | "InvalidBase"
  | "EmptyInput"
  | "InvalidDigit"
  | "MalformedSign"
  | "DivisionByZero"
  | "UnsupportedOperation";

export class ConversionError extends Error {
  readonly code: ConversionErrorCode;

  constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = code;
    this.code = code;
  }
}

export class InvalidBase extends ConversionError {
  readonly base: number | string;

  constructor(base: number | string, message?: string) {
    super("InvalidBase", message ?? `Invalid base: ${base}. Base must be an integer between 2 and 36.`);
    this.base = base;
  }
}

export class EmptyInput extends ConversionError {
  constructor(message = "Empty input") {
    super("EmptyInput", message);
  }
}

export class InvalidDigit extends ConversionError {
  readonly digit: string;
  readonly base: number;
  readonly position: number;

  constructor(digit: string, base: number, position: number) {
    super("InvalidDigit", `Invalid digit "${digit}" for base ${base} at position ${position}.`);
    this.digit = digit;
    this.base = base;
    this.position = position;
  }
}

export class MalformedSign extends ConversionError {
  constructor(input: string) {
    super("MalformedSign", `Malformed sign in "${input}": only one leading '+' or '-' is allowed.`);
  }
}

export class DivisionByZero extends ConversionError {
  constructor(message = "Division by zero") {
    super("DivisionByZero", message);
  }
}

export class UnsupportedOperation extends ConversionError {
  constructor(message = "Unsupported operation") {
    super("UnsupportedOperation", message);
  }
}

export function isConversionError(e: unknown): e is ConversionError {
  return e instanceof ConversionError;
}
