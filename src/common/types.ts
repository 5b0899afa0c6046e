export const DEFAULT_ACCOUNT_ID = "000000000000";
export const DEFAULT_REGION = "us-east-1";

// Max message size: 256 KiB (262,144 bytes) for topic and endpoint publishes
export const SNS_MAX_MESSAGE_SIZE_BYTES = 262_144;

// Single SMS publish limit
export const SMS_MAX_MESSAGE_SIZE_BYTES = 1_600;

export const MAX_SUBJECT_LENGTH = 100;

export const DEFAULT_PAGE_SIZE = 100;

const E164_PATTERN = /^\+?[1-9]\d{1,14}$/;

export function isE164(phoneNumber: string): boolean {
  return E164_PATTERN.test(phoneNumber);
}

/**
 * Extract the region from the AWS v4 Authorization header credential scope.
 * Format: AWS4-HMAC-SHA256 Credential=key/date/region/service/aws4_request, ...
 */
export function regionFromAuth(authHeader: string | undefined): string | undefined {
  if (!authHeader) return undefined;
  const match = authHeader.match(/Credential=\S+?\/\d{8}\/([^/]+)\//);
  return match?.[1];
}

/**
 * Access keys made of exactly twelve digits are treated as the caller's account id,
 * which lets tests address several accounts from one server.
 */
export function accountIdFromAuth(authHeader: string | undefined): string | undefined {
  if (!authHeader) return undefined;
  const match = authHeader.match(/Credential=(\d{12})\//);
  return match?.[1];
}
