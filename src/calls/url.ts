export const VOICE_CALL_URL = 'https://voice.google.com/calls';

/** Google Voice "new call" link. Canonical numbers are `+` and digits, so only `+` needs encoding. */
export function buildCallUrl(canonicalNumber: string): string {
  const encoded = canonicalNumber.replace(/\+/g, '%2B');
  return `${VOICE_CALL_URL}?a=nc,${encoded}`;
}
