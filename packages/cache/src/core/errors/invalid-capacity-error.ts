import { BaseError } from "@stowage/errors"

export type InvalidCapacityErrorCode = "invalid_capacity"

export class InvalidCapacityError extends BaseError<InvalidCapacityErrorCode> {
  constructor(capacity: number) {
    super(`Capacity must be a non-negative safe integer, got ${String(capacity)}`, {
      code: "invalid_capacity",
      context: { capacity },
      isOperational: false,
    })
  }
}

export function assertCapacity(capacity: number): void {
  if (!Number.isSafeInteger(capacity) || capacity < 0) {
    throw new InvalidCapacityError(capacity)
  }
}
