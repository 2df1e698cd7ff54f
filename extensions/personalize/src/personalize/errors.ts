/**
 * AWS SDK v3 error classification by exception name.
 */

export const RESOURCE_NOT_FOUND = "ResourceNotFoundException";
export const RESOURCE_IN_USE = "ResourceInUseException";
export const LIMIT_EXCEEDED = "LimitExceededException";

export function awsErrorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined;
}

export function isAWSError(err: unknown, name: string): boolean {
  return awsErrorName(err) === name;
}
