import type { InvalidRowReason } from "@rowforms/contracts";

export class InvalidRowError extends Error {
  readonly reason: InvalidRowReason;

  constructor(reason: InvalidRowReason, message: string) {
    super(message);
    this.name = "InvalidRowError";
    this.reason = reason;
  }
}

export class InvalidLabelError extends Error {
  readonly label: string;

  constructor(label: string) {
    super(`Not a transformation label: "${label}"`);
    this.name = "InvalidLabelError";
    this.label = label;
  }
}
