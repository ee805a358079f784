import { isRecord } from "../lib/utils";

// Raised by SendCommand while the instance's agent has not registered yet.
export const INSTANCE_NOT_READY_CODE = "InvalidInstanceId";
// Raised by GetCommandInvocation before the invocation record propagates.
export const INVOCATION_MISSING_CODE = "InvocationDoesNotExist";

/**
 * SDK service exceptions carry the service error code as their `name`; some
 * responses also expose it as `Code`.
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  if (!isRecord(error)) {
    return false;
  }
  return error.name === code || error.Code === code;
}
