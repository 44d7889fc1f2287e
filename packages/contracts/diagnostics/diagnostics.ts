/**
 * A validation error describing one rejected setting or input field.
 */
export interface ValidationError {
  /** Which field or parameter failed */
  field: string;

  /** What went wrong */
  reason: string;

  /** Optional: what values are valid */
  hint?: string;
}
