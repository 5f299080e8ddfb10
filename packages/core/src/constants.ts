/**
 * The single literal signal of "no trustworthy answer". Returned verbatim for
 * every refusal, whichever stage refused, so clients can match on it exactly.
 */
export const REFUSAL_TEXT = "No relevant data found in the uploaded documents.";

export const SERVICE_UNAVAILABLE_MESSAGE = "Service temporarily unavailable, please try again.";

const VERSION_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/;

export function isValidVersionLabel(value: string): boolean {
  return VERSION_PATTERN.test(value);
}
