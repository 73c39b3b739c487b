/**
 * Errors raised while turning input dimensions into a frame layout.
 */

/**
 * An input combination that has no real geometric solution, or a field that is
 * not a finite number. Fatal to the layout being computed.
 */
export class DomainError extends Error {
  constructor(
    message: string,
    readonly field: string | null = null
  ) {
    super(message);
    this.name = "DomainError";
  }
}

/** A required key is absent from a bike document */
export class MissingFieldError extends DomainError {
  constructor(field: string) {
    super(`File does not contain "${field}"`, field);
    this.name = "MissingFieldError";
  }
}
