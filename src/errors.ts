export type TranslationErrorKind = 'grammar' | 'missing-reference' | 'missing-field' | 'extends-cycle';

export interface SourceLocation {
  file: string;
  line?: number;
}

export class TranslationError extends Error {
  constructor(
    public readonly kind: TranslationErrorKind,
    message: string,
    public readonly location?: SourceLocation,
  ) {
    super(message);
    this.name = 'TranslationError';
  }
}

export class GrammarError extends TranslationError {
  constructor(message: string, location?: SourceLocation) {
    super('grammar', message, location);
    this.name = 'GrammarError';
  }
}

export class MissingReferenceError extends TranslationError {
  constructor(message: string, location?: SourceLocation) {
    super('missing-reference', message, location);
    this.name = 'MissingReferenceError';
  }
}

export class MissingFieldError extends TranslationError {
  constructor(message: string, location?: SourceLocation) {
    super('missing-field', message, location);
    this.name = 'MissingFieldError';
  }
}

export class ExtendsCycleError extends TranslationError {
  constructor(
    message: string,
    public readonly chain: string[],
    location?: SourceLocation,
  ) {
    super('extends-cycle', message, location);
    this.name = 'ExtendsCycleError';
  }
}
