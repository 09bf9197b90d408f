import { BaseError } from "@stowage/errors"

export type ConfigIssue = {
  path: string
  message: string
}

/**
 * Raised by {@link loadConfig} when the merged sources do not satisfy the schema.
 *
 * The message is zod's prettified report; `context.issues` carries one entry
 * per failed path.
 */
export class ConfigValidationError extends BaseError<"config_validation_error"> {
  constructor(message: string, issues: readonly ConfigIssue[]) {
    super(message, { code: "config_validation_error", context: { issues } })
  }
}
