import { Point } from './entities';

export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

function formatPoint(point: Point): string {
  return `${point.line}:${point.col}`;
}

export class UnsupportedLanguageError extends DomainError {
  constructor(
    public readonly filename: string,
    public readonly language?: string,
  ) {
    super(
      language
        ? `Unsupported language: ${language} (${filename})`
        : `Unsupported language for file: ${filename}`,
    );
  }
}

export class ParseFailureError extends DomainError {
  constructor(
    public readonly filename: string,
    public readonly reason: string,
  ) {
    super(`Failed to parse ${filename}: ${reason}`);
  }
}

export class SeedNotFoundError extends DomainError {
  constructor(public readonly point: Point) {
    super(`No identifier or statement at point ${formatPoint(point)}`);
  }
}

export class CallNotFoundError extends DomainError {
  constructor(public readonly point: Point) {
    super(`No call expression at point ${formatPoint(point)}`);
  }
}

export class TargetUnresolvableError extends DomainError {
  constructor(public readonly point: Point) {
    super(`No function definition at target point ${formatPoint(point)}`);
  }
}

export class ArityMismatchError extends DomainError {
  constructor(
    public readonly functionName: string,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(
      `Arity mismatch: ${functionName} expects ${expected} argument(s) but the call passes ${actual}`,
    );
  }
}

export class InlineError extends DomainError {}

export class InvalidLocationError extends DomainError {
  constructor(
    public readonly location: string,
    problem = 'Invalid location format',
  ) {
    super(`${problem}: ${location}`);
  }
}
