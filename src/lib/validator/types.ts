/**
 * Validator module types
 */

export interface StreamValidationOptions {
  /** Cap on stored record errors; totals keep counting past it */
  maxErrors?: number;
}
