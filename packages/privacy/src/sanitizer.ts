/**
 * Credential sanitizer
 *
 * Redacts connection-string secrets, SAS signatures, function keys and
 * JWTs from free text (URLs, log messages, exception details).
 */

export const SECRET_REPLACEMENT = '[Hidden Credential]';

/**
 * Tokens that start a credential value, matched case-insensitively.
 *
 * Order matters: longer tokens that contain a shorter one (`AccountKey=`
 * contains `key=`) must come first.
 */
export const CREDENTIAL_TOKENS = [
  'Token=',
  'DefaultEndpointsProtocol=http',
  'AccountKey=',
  'Data Source=',
  'Server=',
  'Password=',
  'pwd=',
  '&amp;sig=',
  '&sig=',
  '?sig=',
  'SharedAccessKey=',
  '&amp;code=',
  '&code=',
  '?code=',
  'key=',
] as const;

/**
 * Tokens that contain a credential token but are not secrets.
 */
export const ALLOWED_TOKENS = ['PublicKeyToken='] as const;

const VALUE_TERMINATORS = ['<', '"', "'"];

const JWT_PATTERN = /eyJ[A-Za-z0-9_-]{2,}\.eyJ[A-Za-z0-9_-]{2,}\.[A-Za-z0-9_-]*/g;

const LOWER_TOKENS = CREDENTIAL_TOKENS.map((token) => token.toLowerCase());
const LOWER_ALLOWED = ALLOWED_TOKENS.map((token) => token.toLowerCase());

/**
 * Fast check for any credential token or JWT in the input.
 */
export function mayContainCredentials(input: string | undefined): boolean {
  if (!input) {
    return false;
  }
  const lower = input.toLowerCase();
  if (LOWER_TOKENS.some((token) => lower.includes(token))) {
    return true;
  }
  JWT_PATTERN.lastIndex = 0;
  return JWT_PATTERN.test(input);
}

/**
 * Replace every credential value in the input with `[Hidden Credential]`.
 *
 * A value runs from its token to the next `<`, `"` or `'`, or to the end
 * of the input.
 */
export function sanitize(input: string): string;
export function sanitize(input: string | undefined): string | undefined;
export function sanitize(input: string | undefined): string | undefined {
  if (!input || !mayContainCredentials(input)) {
    return input;
  }

  let result = input;
  for (const token of LOWER_TOKENS) {
    result = redactToken(result, token);
  }

  return result.replace(JWT_PATTERN, SECRET_REPLACEMENT);
}

function redactToken(input: string, token: string): string {
  let result = input;
  let from = 0;

  for (;;) {
    const lower = result.toLowerCase();
    const start = lower.indexOf(token, from);
    if (start === -1) {
      return result;
    }

    if (isAllowed(lower, start, token)) {
      from = start + token.length;
      continue;
    }

    const end = findValueEnd(result, start + token.length);
    result = result.slice(0, start) + SECRET_REPLACEMENT + result.slice(end);
    from = start + SECRET_REPLACEMENT.length;
  }
}

function isAllowed(lower: string, start: number, token: string): boolean {
  for (const allowed of LOWER_ALLOWED) {
    const offset = allowed.indexOf(token);
    if (offset === -1) {
      continue;
    }
    const allowedStart = start - offset;
    if (allowedStart >= 0 && lower.startsWith(allowed, allowedStart)) {
      return true;
    }
  }
  return false;
}

function findValueEnd(input: string, from: number): number {
  let end = input.length;
  for (const terminator of VALUE_TERMINATORS) {
    const index = input.indexOf(terminator, from);
    if (index !== -1 && index < end) {
      end = index;
    }
  }
  return end;
}
