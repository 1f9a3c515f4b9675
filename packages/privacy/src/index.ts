/**
 * @fnhost/privacy
 *
 * Credential redaction for telemetry. Span processors and Application
 * Insights telemetry processors run URLs and messages through `sanitize`
 * before export.
 */

export {
  sanitize,
  mayContainCredentials,
  SECRET_REPLACEMENT,
  CREDENTIAL_TOKENS,
  ALLOWED_TOKENS,
} from './sanitizer.js';
