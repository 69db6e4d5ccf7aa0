/**
 * Error taxonomy for Sh-Data rendering.
 *
 * ValidationError  - input record is malformed or incomplete (caller must fix source data)
 * EncodingError    - a value holds characters XML 1.0 cannot carry
 * AssemblyError    - renderer and assembler disagree about the document tree (defect)
 */

export interface ErrorDetail {
  field: string;
  message: string;
}

export abstract class ShDataError extends Error {
  public abstract readonly code: string;

  constructor(
    message: string,
    public readonly details: ErrorDetail[] = [],
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends ShDataError {
  public readonly code = "VALIDATION_ERROR";
}

export class EncodingError extends ShDataError {
  public readonly code = "ENCODING_ERROR";
}

export class AssemblyError extends ShDataError {
  public readonly code = "ASSEMBLY_ERROR";
}
